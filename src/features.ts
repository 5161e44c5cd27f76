/**
 * Feature Selection
 * Turns CLI flags into the ordered feature list the test command is built with
 */

import { confirm, type LineSource } from "./prompt.js";

/**
 * Tested subsystems, in the order they are passed to the test command
 */
export const FEATURES = ["raspicam", "fona", "gps", "telemetry", "no_power_off"] as const;

export type Feature = (typeof FEATURES)[number];

/**
 * Parsed boolean flags. `no_sms` only modifies behavior and is never reported.
 */
export type FeatureFlags = Partial<Record<Feature | "no_sms", boolean>>;

export interface FeatureSelection {
  features: readonly Feature[];
  /** Space-joined form handed to `--features`; empty when nothing is selected */
  featureString: string;
}

export const SMS_COST_PROMPT =
  "You decided to test by sending SMSs but this can cost you money, are you sure? (y/n)";

export function joinFeatures(features: readonly Feature[]): string {
  return features.join(" ");
}

/**
 * Selected features in declaration order, whatever order the flags came in
 */
export function orderedFeatures(flags: FeatureFlags): Feature[] {
  return FEATURES.filter((feature) => flags[feature] === true);
}

/**
 * Build the feature selection. Unless `no_sms` is set the operator must
 * accept the SMS cost first; declining returns null.
 */
export async function selectFeatures(
  flags: FeatureFlags,
  source: LineSource
): Promise<FeatureSelection | null> {
  if (!flags.no_sms) {
    const accepted = await confirm(source, SMS_COST_PROMPT);
    if (!accepted) {
      return null;
    }
  }

  const features = orderedFeatures(flags);
  return { features, featureString: joinFeatures(features) };
}
