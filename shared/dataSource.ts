/**
 * Data Source Labels
 *
 * Every measurement carries the label of the device or app that produced it. Labels are
 * free-form (sync clients send whatever the platform reports), but the well-known ones
 * are listed here so clients and defaults agree on spelling.
 */

export const DATA_SOURCES = {
  APPLE_WATCH: 'Apple Watch',
  FITBIT: 'Fitbit',
  GARMIN: 'Garmin',
  SAMSUNG: 'Samsung',
  GOOGLE_FIT: 'Google Fit',
  STRAVA: 'Strava',
  MANUAL: 'Manual',
  OTHER: 'Other',
} as const;

export type KnownDataSource = typeof DATA_SOURCES[keyof typeof DATA_SOURCES];

export const ALL_DATA_SOURCES: KnownDataSource[] = Object.values(DATA_SOURCES);

export const MAX_SOURCE_LABEL_LENGTH = 100;

/**
 * Collapse runs of whitespace and trim, so "Apple  Watch " and "Apple Watch" share a
 * natural key. Case is preserved.
 */
export function normalizeSourceLabel(label: string): string {
  return label.replace(/\s+/g, ' ').trim();
}

export function isKnownDataSource(label: string): label is KnownDataSource {
  return ALL_DATA_SOURCES.some((source) => source === label);
}
