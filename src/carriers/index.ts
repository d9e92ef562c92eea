import { CarrierRegistry } from '../registry.js';
import type { CarrierProfilesFile } from './profile.js';
import { createSelectorCarrier, type SelectorCarrierOptions } from './selectorCarrier.js';

export { createSelectorCarrier } from './selectorCarrier.js';
export type { SelectorCarrierOptions } from './selectorCarrier.js';
export { loadCarrierProfiles, parseCarrierProfiles } from './profile.js';
export type { CarrierProfile, CarrierProfilesFile } from './profile.js';

export function buildCarrierRegistry(
  profiles: CarrierProfilesFile,
  options: SelectorCarrierOptions
): CarrierRegistry {
  const registry = new CarrierRegistry();
  for (const profile of profiles.carriers) {
    registry.register(createSelectorCarrier(profile, options), {
      default: profile.code === profiles.default,
    });
  }
  return registry;
}
