/**
 * Choice lists for member profile fields (salutations, states, countries, vessel options).
 *
 * The lists live in data/choices.json; time zones come from the runtime's IANA database.
 */

import { readFileSync } from 'fs';
import { z } from 'zod';

const ChoiceSchema = z.object({
  value: z.string().min(1),
  label: z.string().min(1),
});

const ChoicesFileSchema = z.object({
  salutations: z.array(z.string().min(1)),
  vesselTypes: z.array(ChoiceSchema),
  vesselPowerRequirements: z.array(ChoiceSchema),
  vesselTiePreferences: z.array(ChoiceSchema),
  usStates: z.array(ChoiceSchema),
  countries: z.array(ChoiceSchema),
});

export type Choice = z.infer<typeof ChoiceSchema>;
export type ChoiceLists = z.infer<typeof ChoicesFileSchema>;

let cached: ChoiceLists | null = null;
let timezones: Set<string> | null = null;

export function loadChoices(): ChoiceLists {
  if (!cached) {
    const raw = readFileSync(new URL('../../data/choices.json', import.meta.url), 'utf-8');
    cached = ChoicesFileSchema.parse(JSON.parse(raw));
  }
  return cached;
}

export function getTimezones(): Set<string> {
  if (!timezones) {
    timezones = new Set(Intl.supportedValuesOf('timeZone'));
    // Intl omits the canonical UTC alias on some runtimes
    timezones.add('UTC');
  }
  return timezones;
}

export function isChoiceValue(choices: Choice[], value: string): boolean {
  return choices.some(choice => choice.value === value);
}
