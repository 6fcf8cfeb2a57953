/**
 * Personalization Service
 *
 * Resolves the settings that key a lookup: profile fields with defaults,
 * plus the interest context taken from the interest graph.
 */

import { GENERAL_INTEREST } from '../models/interest-graph.model.js';
import {
  resolvePersonalization,
  type PersonalizationSettings,
  type UserProfile,
} from '../models/user-profile.model.js';
import type { IProfileStore } from '../stores/profile-store.js';

export interface ResolvedPersonalization {
  /** Null for anonymous lookups or users without a profile */
  profile: UserProfile | null;
  settings: PersonalizationSettings;
}

export class PersonalizationService {
  constructor(private readonly profiles: IProfileStore) {}

  async resolve(userId: string | null): Promise<ResolvedPersonalization> {
    if (userId === null) {
      return { profile: null, settings: resolvePersonalization(null) };
    }

    const profile = await this.profiles.find(userId);
    const stored = profile ? await this.profiles.readInterestGraph(userId) : null;
    const interestContext = stored?.graph.topInterest() ?? GENERAL_INTEREST;

    return { profile, settings: resolvePersonalization(profile, interestContext) };
  }
}
