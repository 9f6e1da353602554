import type { PageDriver, ScrollDelta, ScrollOutcome } from "../../src/extraction/page-driver";
import type { ListProfile } from "../../src/extraction/types";
import { TransientElementError } from "../../src/runtime/errors";

export interface FakeRecord {
  label: string;
  name?: string;
  headline?: string;
  profileUrl?: string;
  /** Shown only after the contact control is activated. */
  phone?: string;
  email?: string;
  /** Shown in the profile page's contact overlay. */
  profileEmail?: string;
  websites?: string[];
}

export interface FakeNode {
  id: string;
  text: string;
  attrs: Record<string, string>;
  selectors: string[];
  displayed: boolean;
  enabled: boolean;
  onActivate?: () => void;
}

export interface FakeListOptions {
  records: FakeRecord[];
  /** Items loaded before any expansion. Defaults to all records. */
  initialLoaded?: number;
  /** Items added per load-more activation or lazy-load scroll. */
  pageSize?: number;
  loadMoreControl?: boolean;
  /** Scrolling the list to its end lazy-loads the next page. */
  scrollLoads?: boolean;
  /** How many loaded items are rendered at once. Defaults to all. */
  windowSize?: number;
  itemHeightPx?: number;
  /** Location reported after navigation instead of the requested URL. */
  landingUrl?: string;
  /** Labels whose first label read fails as detached. */
  detachOnLabelRead?: string[];
  /** Labels whose first activation fails as detached. */
  detachOnActivate?: string[];
  /** Navigation attempts that fail before one succeeds. */
  failedNavigations?: number;
  /** Requested URL to landed URL, applied before `landingUrl`. */
  redirects?: Record<string, string>;
}

export const FAKE_AFFIX = ", Verified profile";

export const FAKE_PROFILE: ListProfile = {
  id: "fake-list",
  listUrlTemplate: "https://lists.example.test/lists/{listId}/members",
  filterParam: "rating",
  filters: ["GOOD_FIT", "MAYBE"],
  landingPattern: "/lists/",
  itemLocator: ".item",
  label: { attribute: "aria-label", affixes: [FAKE_AFFIX] },
  loadMore: [{ locator: "button", contains: "Load more" }],
  listContainers: [".list"],
  primaryFields: {
    name: [".detail h1"],
    headline: [".detail .headline"],
    profileUrl: [{ locator: ".detail a.profile", attribute: "href", stripQuery: true }],
  },
  reveal: {
    control: [{ locator: "button", contains: "Contact" }],
    fields: {
      phone: [{ locator: ".contact a.tel", attribute: "href", scheme: "tel:" }, ".contact .phone"],
      email: [{ locator: ".contact a.mail", attribute: "href", scheme: "mailto:" }],
    },
  },
  dismiss: ["button.dismiss"],
};

export const PROFILE_PAGE_ORIGIN = "https://people.example.test/in/";

export const FAKE_PROFILE_WITH_PAGE: ListProfile = {
  ...FAKE_PROFILE,
  profilePage: {
    urlField: "profileUrl",
    landingPattern: "^/in/",
    ready: "main h1",
    reveal: {
      control: ["a.contact-info"],
      fields: {
        email: [{ locator: ".ci-email a", contains: "@" }],
        websites: [{ locator: ".ci-websites a", attribute: "href", multiple: true }],
      },
    },
    dismiss: ["button.dismiss"],
  },
};

export const makeRecords = (count: number, withContact = true): FakeRecord[] =>
  Array.from({ length: count }, (_, index) => {
    const n = index + 1;
    return {
      label: `Person ${n}${FAKE_AFFIX}`,
      name: `Person ${n}`,
      headline: `Role ${n}`,
      profileUrl: `https://people.example.test/in/person-${n}/?trk=list`,
      phone: withContact ? `+1 555 010${n % 10}` : undefined,
      email: withContact ? `person${n}@example.test` : undefined,
    };
  });

/**
 * In-process virtualized list: a window of loaded items is rendered, the
 * rest appear through load-more activations or lazy-load scrolling, and a
 * detail panel with a contact reveal follows the selected item.
 */
export class FakeListDriver implements PageDriver<FakeNode> {
  public readonly calls: Record<string, number> = {};
  public readonly navigations: string[] = [];
  public readonly sleeps: number[] = [];
  public readonly activatedKeys: string[] = [];
  public readonly pressedKeys: string[] = [];

  private readonly records: FakeRecord[];
  private readonly pageSize: number;
  private readonly loadMoreControl: boolean;
  private readonly scrollLoads: boolean;
  private readonly windowSize: number;
  private readonly itemHeightPx: number;
  private readonly landingUrl: string | null;
  private readonly detachOnLabelRead: Set<string>;
  private readonly detachOnActivate: Set<string>;
  private readonly redirects: Record<string, string>;
  private failedNavigations: number;

  private loaded: number;
  private windowStart = 0;
  private location = "about:blank";
  private selected: number | null = null;
  private revealed = false;

  public constructor(options: FakeListOptions) {
    this.records = options.records;
    this.loaded = Math.min(options.initialLoaded ?? options.records.length, options.records.length);
    this.pageSize = options.pageSize ?? 10;
    this.loadMoreControl = options.loadMoreControl ?? false;
    this.scrollLoads = options.scrollLoads ?? false;
    this.windowSize = options.windowSize ?? Number.MAX_SAFE_INTEGER;
    this.itemHeightPx = options.itemHeightPx ?? 100;
    this.landingUrl = options.landingUrl ?? null;
    this.detachOnLabelRead = new Set(options.detachOnLabelRead ?? []);
    this.detachOnActivate = new Set(options.detachOnActivate ?? []);
    this.failedNavigations = options.failedNavigations ?? 0;
    this.redirects = options.redirects ?? {};
  }

  public get loadedCount(): number {
    return this.loaded;
  }

  public count(method: string): number {
    return this.calls[method] ?? 0;
  }

  public async navigate(url: string): Promise<void> {
    this.track("navigate");
    this.navigations.push(url);
    if (this.failedNavigations > 0) {
      this.failedNavigations -= 1;
      throw new Error("net::ERR_CONNECTION_RESET");
    }
    this.location = this.redirects[url] ?? this.landingUrl ?? url;
    this.revealed = false;
  }

  public async currentUrl(): Promise<string> {
    this.track("currentUrl");
    return this.location;
  }

  public async findAll(locator: string, scope?: FakeNode): Promise<FakeNode[]> {
    this.track("findAll");
    if (scope) return [];
    return this.render().filter((node) => node.selectors.includes(locator));
  }

  public async findFirst(locator: string, scope?: FakeNode): Promise<FakeNode | null> {
    const [first] = await this.findAll(locator, scope);
    return first ?? null;
  }

  public async attribute(handle: FakeNode, name: string): Promise<string | null> {
    this.track("attribute");
    if (name === "aria-label" && this.detachOnLabelRead.delete(handle.attrs[name] ?? "")) {
      throw new TransientElementError("attribute");
    }
    return handle.attrs[name] ?? null;
  }

  public async text(handle: FakeNode): Promise<string> {
    this.track("text");
    return handle.text;
  }

  public async click(handle: FakeNode): Promise<void> {
    this.track("click");
    handle.onActivate?.();
  }

  public async activate(handle: FakeNode): Promise<void> {
    this.track("activate");
    const label = handle.attrs["aria-label"];
    if (label && this.detachOnActivate.delete(label)) {
      throw new TransientElementError("activate");
    }
    if (label) this.activatedKeys.push(label);
    handle.onActivate?.();
  }

  public async scrollIntoView(): Promise<void> {
    this.track("scrollIntoView");
  }

  public async scrollContainer(locator: string | null, delta: ScrollDelta): Promise<ScrollOutcome> {
    this.track("scrollContainer");
    if (locator !== ".list") {
      return { scrolled: false, offset: 0, extent: 0 };
    }

    const before = this.windowStart;
    const loadedBefore = this.loaded;
    if (delta === "start") {
      this.windowStart = 0;
    } else if (delta === "end") {
      if (this.scrollLoads) this.loaded = Math.min(this.records.length, this.loaded + this.pageSize);
      this.windowStart = this.maxWindowStart();
    } else {
      const step = Math.round(delta / this.itemHeightPx);
      this.windowStart = Math.max(0, Math.min(this.maxWindowStart(), this.windowStart + step));
    }

    return {
      scrolled: this.windowStart !== before || this.loaded !== loadedBefore,
      offset: this.windowStart * this.itemHeightPx,
      extent: this.loaded * this.itemHeightPx,
    };
  }

  public async typeText(handle: FakeNode, text: string): Promise<void> {
    this.track("typeText");
    handle.attrs.value = text;
  }

  public async pressKey(_handle: FakeNode | null, key: string): Promise<void> {
    this.track("pressKey");
    this.pressedKeys.push(key);
    if (key === "Escape") this.revealed = false;
  }

  public async isDisplayed(handle: FakeNode): Promise<boolean> {
    return handle.displayed;
  }

  public async isEnabled(handle: FakeNode): Promise<boolean> {
    return handle.enabled;
  }

  public async waitFor(locator: string, timeoutMs: number): Promise<boolean> {
    this.track("waitFor");
    const found = (await this.findAll(locator)).length > 0;
    if (!found) this.sleeps.push(timeoutMs);
    return found;
  }

  public async sleep(ms: number): Promise<void> {
    this.sleeps.push(ms);
  }

  private track(method: string): void {
    this.calls[method] = (this.calls[method] ?? 0) + 1;
  }

  private maxWindowStart(): number {
    return Math.max(0, this.loaded - Math.min(this.windowSize, this.loaded));
  }

  private render(): FakeNode[] {
    if (this.location.startsWith(PROFILE_PAGE_ORIGIN)) return this.renderProfilePage();
    if (!this.location.startsWith("https://lists.example.test/lists/")) {
      return [{ id: "body", text: "", attrs: {}, selectors: ["body"], displayed: true, enabled: true }];
    }

    const nodes: FakeNode[] = [
      { id: "body", text: "", attrs: {}, selectors: ["body"], displayed: true, enabled: true },
    ];
    const end = Math.min(this.loaded, this.windowStart + this.windowSize);
    for (let index = this.windowStart; index < end; index += 1) {
      const record = this.records[index];
      nodes.push({
        id: `item-${index}`,
        text: record.name ?? "",
        attrs: { "aria-label": record.label },
        selectors: [".item"],
        displayed: true,
        enabled: true,
        onActivate: () => {
          this.selected = index;
          this.revealed = false;
        },
      });
    }

    if (this.loadMoreControl && this.loaded < this.records.length) {
      nodes.push({
        id: "load-more",
        text: "Load more",
        attrs: {},
        selectors: ["button"],
        displayed: true,
        enabled: true,
        onActivate: () => {
          this.loaded = Math.min(this.records.length, this.loaded + this.pageSize);
        },
      });
    }

    const record = this.selected === null ? null : this.records[this.selected];
    if (!record) return nodes;

    const field = (
      id: string,
      selector: string,
      text: string | undefined,
      attrs: Record<string, string> = {},
    ): void => {
      if (text === undefined) return;
      nodes.push({ id, text, attrs, selectors: [selector], displayed: true, enabled: true });
    };
    field("name", ".detail h1", record.name);
    field("headline", ".detail .headline", record.headline);
    if (record.profileUrl) {
      field("profile", ".detail a.profile", "View profile", { href: record.profileUrl });
    }

    if (record.phone || record.email) {
      nodes.push({
        id: "contact",
        text: "Contact",
        attrs: {},
        selectors: ["button"],
        displayed: true,
        enabled: true,
        onActivate: () => {
          this.revealed = true;
        },
      });
    }

    if (this.revealed) {
      if (record.phone) {
        field("tel", ".contact a.tel", record.phone, {
          href: `tel:${encodeURIComponent(record.phone)}`,
        });
      }
      if (record.email) {
        field("mail", ".contact a.mail", record.email, { href: `mailto:${record.email}` });
      }
      nodes.push({
        id: "dismiss",
        text: "Dismiss",
        attrs: {},
        selectors: ["button", "button.dismiss"],
        displayed: true,
        enabled: true,
        onActivate: () => {
          this.revealed = false;
        },
      });
    }

    return nodes;
  }

  private renderProfilePage(): FakeNode[] {
    const body: FakeNode = {
      id: "body",
      text: "",
      attrs: {},
      selectors: ["body"],
      displayed: true,
      enabled: true,
    };
    const record = this.records.find(
      (entry) => entry.profileUrl?.split("?")[0] === this.location,
    );
    if (!record) return [body];

    const nodes: FakeNode[] = [
      body,
      {
        id: "profile-name",
        text: record.name ?? "",
        attrs: {},
        selectors: ["main h1"],
        displayed: true,
        enabled: true,
      },
      {
        id: "contact-info",
        text: "Contact info",
        attrs: {},
        selectors: ["a.contact-info"],
        displayed: true,
        enabled: true,
        onActivate: () => {
          this.revealed = true;
        },
      },
    ];
    if (!this.revealed) return nodes;

    if (record.profileEmail) {
      nodes.push({
        id: "ci-email",
        text: record.profileEmail,
        attrs: { href: `mailto:${record.profileEmail}` },
        selectors: [".ci-email a"],
        displayed: true,
        enabled: true,
      });
    }
    for (const [index, site] of (record.websites ?? []).entries()) {
      nodes.push({
        id: `ci-website-${index}`,
        text: site,
        attrs: { href: site },
        selectors: [".ci-websites a"],
        displayed: true,
        enabled: true,
      });
    }
    nodes.push({
      id: "dismiss",
      text: "Dismiss",
      attrs: {},
      selectors: ["button", "button.dismiss"],
      displayed: true,
      enabled: true,
      onActivate: () => {
        this.revealed = false;
      },
    });
    return nodes;
  }
}
