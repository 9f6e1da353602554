import type {
  ExtractionResult,
  HarvestState,
  HarvestStopReason,
  HarvestTarget,
  FieldValue,
  Item,
  ProfileContactStats,
} from "./types";

export const createHarvestState = (): HarvestState => ({
  loadedCount: 0,
  processedCount: 0,
  scrollOffset: 0,
  consecutiveNoProgress: 0,
  consecutiveLoadFailures: 0,
  rounds: 0,
  duplicatesSkipped: 0,
});

const hasValue = (value: FieldValue | undefined): boolean => {
  if (Array.isArray(value)) return value.length > 0;
  return typeof value === "string" && value.trim().length > 0;
};

export class ResultBuilder {
  private readonly items: Item[] = [];
  private readonly secondaryFields: string[];
  private readonly startedAt = new Date().toISOString();

  public constructor(secondaryFields: string[]) {
    this.secondaryFields = [...new Set(secondaryFields)];
  }

  public get entries(): readonly Item[] {
    return this.items;
  }

  public append(item: Item): void {
    this.items.push(item);
  }

  public replace(index: number, item: Item): void {
    if (index < 0 || index >= this.items.length) return;
    this.items[index] = item;
  }

  public finalize(params: {
    target: HarvestTarget;
    profileId: string;
    state: HarvestState;
    stopReason: HarvestStopReason;
    profileContacts?: ProfileContactStats | null;
  }): ExtractionResult {
    const secondaryFieldCounts: Record<string, number> = {};
    for (const field of this.secondaryFields) {
      secondaryFieldCounts[field] = this.items.filter((item) => hasValue(item.fields[field])).length;
    }

    return {
      listId: params.target.listId,
      profileId: params.profileId,
      filter: params.target.filter,
      mode: params.target.mode,
      totalProcessed: this.items.length,
      loadedCount: params.state.loadedCount,
      secondaryFieldCounts,
      items: [...this.items],
      state: { ...params.state },
      stopReason: params.stopReason,
      profileContacts: params.profileContacts ?? null,
      startedAt: this.startedAt,
      finishedAt: new Date().toISOString(),
    };
  }
}
