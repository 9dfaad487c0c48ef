/**
 * Treatment types - entries from the Nightscout treatments feed
 */

/**
 * A logged treatment (meal, bolus, basal injection, finger stick)
 *
 * Numeric fields stay as the text the user entered; they are parsed where
 * they are used so that display keeps the original form ("2.50" stays "2.50").
 */
export interface TreatmentEvent {
  /** Unix timestamp in milliseconds */
  readonly timestamp: number;
  /** Free-text notes, parsed by parseNote() */
  readonly rawNotes: string | null;
  /** Carbs in grams */
  readonly carbsText: string | null;
  /** Insulin units actually given */
  readonly insulinText: string | null;
  /** Manual (finger stick) glucose check, distinct from the sensor value */
  readonly measuredGlucoseText: string | null;
}
