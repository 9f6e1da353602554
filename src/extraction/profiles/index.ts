import { createListProfileValidator } from "../../api/schema-validation";
import { ProfileNotFoundError } from "../../runtime/errors";
import type { ListProfile } from "../types";
import { HIRING_APPLICANTS_PROFILE } from "./hiring-applicants";

export const createDefaultProfiles = (): ListProfile[] => [HIRING_APPLICANTS_PROFILE];

const validateListProfile = createListProfileValidator();

/**
 * A custom profile supplied with the request takes precedence over the
 * registered ones and is schema-checked first.
 */
export const resolveProfile = (
  selection: { profileId: string; customProfile: Record<string, unknown> | null },
  profiles: ListProfile[] = createDefaultProfiles(),
): ListProfile => {
  if (selection.customProfile) {
    return validateListProfile(selection.customProfile);
  }

  const profile = profiles.find((entry) => entry.id === selection.profileId);
  if (!profile) {
    throw new ProfileNotFoundError(
      selection.profileId,
      profiles.map((entry) => entry.id),
    );
  }
  return profile;
};
