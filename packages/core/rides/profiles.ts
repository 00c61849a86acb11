/**
 * PROVIDER PROFILES & REGISTRY
 */

import type { ProviderId } from "@shared/schema";
import type { ProviderProfile } from "./types";

// ============================================
// BUILT-IN PROFILES
// ============================================

export const UBER_PROFILE: ProviderProfile = {
  id: "uber",
  appName: "Uber",
  packageName: "com.ubercab",
  rideTypes: {
    car: "UberGo",
    rickshaw: "Uber Auto",
    bike: "Uber Moto",
    auto: "Uber Auto",
    premium: "Uber XL",
  },
  hints: {
    searchField: 'the "Where to?" box or the search icon',
    suggestion: "Pick the first matching suggestion from the list",
    rideTypeExamples: ["UberGo", "Uber Auto", "Uber Moto"],
    etaExample: "5 mins",
  },
  bookingExtraSteps: ["Keep the default payment method"],
};

export const OLA_PROFILE: ProviderProfile = {
  id: "ola",
  appName: "Ola",
  packageName: "com.olacabs.customer",
  rideTypes: {
    car: "Ola Prime",
    rickshaw: "Ola Auto",
    bike: "Ola Bike",
    auto: "Ola Auto",
    premium: "Ola Plus",
  },
  hints: {
    searchField: 'the "Where to?" box at the top',
    suggestion: "Select the matching place from the suggestions",
    rideTypeExamples: ["Ola Mini", "Ola Prime", "Ola Auto"],
    etaExample: "4 mins",
  },
  bookingExtraSteps: ["Apply any offer or coupon shown on the screen"],
};

export const RAPIDO_PROFILE: ProviderProfile = {
  id: "rapido",
  appName: "Rapido",
  packageName: "com.rapido.passenger",
  rideTypes: {
    car: "Auto",
    rickshaw: "Auto",
    bike: "Bike",
    auto: "Auto",
    premium: "Auto",
  },
  hints: {
    searchField: "the destination field at the top of the screen",
    suggestion: "Choose the matching location from the dropdown",
    rideTypeExamples: ["Bike", "Auto"],
    etaExample: "3 mins",
  },
  bookingExtraSteps: ["Review the fare breakdown"],
};

export const BUILT_IN_PROFILES: readonly ProviderProfile[] = [UBER_PROFILE, OLA_PROFILE, RAPIDO_PROFILE];

// ============================================
// REGISTRY
// ============================================

export class ProviderRegistry {
  private profiles = new Map<ProviderId, ProviderProfile>();

  constructor(profiles: readonly ProviderProfile[] = []) {
    profiles.forEach((profile) => this.register(profile));
  }

  register(profile: ProviderProfile): void {
    if (this.profiles.has(profile.id)) {
      throw new Error(`Provider ${profile.id} already registered`);
    }
    this.profiles.set(profile.id, profile);
  }

  has(id: ProviderId): boolean {
    return this.profiles.has(id);
  }

  get(id: ProviderId): ProviderProfile | undefined {
    return this.profiles.get(id);
  }

  require(id: ProviderId): ProviderProfile {
    const profile = this.profiles.get(id);
    if (!profile) {
      throw new Error(`Provider ${id} not registered`);
    }
    return profile;
  }

  /** In registration order */
  list(): ProviderProfile[] {
    return [...this.profiles.values()];
  }
}

export function createDefaultProviderRegistry(): ProviderRegistry {
  return new ProviderRegistry(BUILT_IN_PROFILES);
}
