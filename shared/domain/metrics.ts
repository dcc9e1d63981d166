import { z } from "zod";
import { normalizeTimestamp } from "../utils/timestamps";
import { DATA_SOURCES } from "../dataSource";

/**
 * Metric kinds accepted by the ingestion endpoints.
 *
 * Each kind is one variant of the time-series record: it owns its RID tag, its route
 * segment and a measurement schema. The schema both validates bounds and coerces values
 * into their stored form, so the ingestion engine itself stays kind-agnostic.
 */
export const METRIC_KINDS = [
  "steps",
  "miles",
  "workouts",
  "heart-rate",
  "body-composition",
  "active-calories",
  "baseline-calories",
  "sleep",
  "nutrition-macros",
] as const;

export type MetricKind = typeof METRIC_KINDS[number];

/** Stored form of a record's measurements (jsonb). */
export type Measurements = Record<string, number | string>;

export interface MetricDefinition {
  kind: MetricKind;
  label: string;
  ridTag: string;
  /** Applied when a point arrives without a source label. */
  defaultSource?: string;
  measurements: z.ZodType<Partial<Measurements>, z.ZodTypeDef, unknown>;
}

// ==================== FIELD BUILDERS ====================

const nonNegative = () => z.number().finite().min(0);

const percentage = () => z.number().finite().min(0).max(100);

/** Discrete counts arrive as floats from some devices; stored floored. */
const count = () => nonNegative().transform((value) => Math.floor(value));

const beatsPerMinute = () =>
  z.number().finite().min(0).max(300).transform((value) => Math.round(value));

const text = (max = 200) => z.string().trim().min(1).max(max);

const instant = () =>
  z.union([z.string(), z.date()]).transform((value, ctx) => {
    const parsed = normalizeTimestamp(value);
    if (!parsed) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "Invalid ISO-8601 timestamp" });
      return z.NEVER;
    }
    return parsed.toISOString();
  });

function requireMeasurement<S extends z.AnyZodObject>(schema: S) {
  return schema.superRefine((value, ctx) => {
    const present = Object.values(value).some((field) => field !== undefined);
    if (!present) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "At least one measurement field is required",
      });
    }
  });
}

// ==================== DEFINITIONS ====================

export const metricDefinitions: Record<MetricKind, MetricDefinition> = {
  steps: {
    kind: "steps",
    label: "Steps",
    ridTag: "steps",
    measurements: requireMeasurement(z.object({
      steps: count().optional(),
    })),
  },
  miles: {
    kind: "miles",
    label: "Miles",
    ridTag: "miles",
    measurements: requireMeasurement(z.object({
      miles: nonNegative().optional(),
      activityType: text(50).optional(),
    })),
  },
  workouts: {
    kind: "workouts",
    label: "Workout",
    ridTag: "workout",
    defaultSource: DATA_SOURCES.MANUAL,
    measurements: z.object({
      workoutType: text(50),
      workoutName: text().optional(),
      durationMinutes: count().optional(),
      caloriesBurned: nonNegative().optional(),
      distanceMiles: nonNegative().optional(),
      avgHeartRate: beatsPerMinute().optional(),
      maxHeartRate: beatsPerMinute().optional(),
      intensity: z.enum(["low", "moderate", "high"]).optional(),
      notes: text(2000).optional(),
    }),
  },
  "heart-rate": {
    kind: "heart-rate",
    label: "Heart rate",
    ridTag: "heartrate",
    measurements: requireMeasurement(z.object({
      heartRate: beatsPerMinute().optional(),
      minHr: beatsPerMinute().optional(),
      avgHr: z.number().finite().min(0).max(300).optional(),
      maxHr: beatsPerMinute().optional(),
      restingHr: beatsPerMinute().optional(),
      heartRateVariability: nonNegative().optional(),
    })),
  },
  "body-composition": {
    kind: "body-composition",
    label: "Body composition",
    ridTag: "bodycomp",
    defaultSource: DATA_SOURCES.MANUAL,
    measurements: requireMeasurement(z.object({
      weight: nonNegative().optional(),
      bodyFatPercentage: percentage().optional(),
      muscleMassPercentage: percentage().optional(),
      boneDensity: nonNegative().optional(),
      waterPercentage: percentage().optional(),
      visceralFat: nonNegative().optional(),
      bmr: nonNegative().optional(),
      measurementMethod: text(50).optional(),
      notes: text(2000).optional(),
    })),
  },
  "active-calories": {
    kind: "active-calories",
    label: "Active calories",
    ridTag: "activecalories",
    measurements: requireMeasurement(z.object({
      caloriesBurned: count().optional(),
    })),
  },
  "baseline-calories": {
    kind: "baseline-calories",
    label: "Baseline calories",
    ridTag: "basecalories",
    measurements: requireMeasurement(z.object({
      baselineCalories: count().optional(),
      bmr: nonNegative().optional(),
      tdee: nonNegative().optional(),
      activityLevel: z.enum([
        "sedentary",
        "lightly_active",
        "moderately_active",
        "very_active",
        "extremely_active",
      ]).optional(),
    })),
  },
  sleep: {
    kind: "sleep",
    label: "Sleep",
    ridTag: "sleep",
    measurements: requireMeasurement(z.object({
      bedtime: instant().optional(),
      wakeTime: instant().optional(),
      totalSleepMinutes: count().optional(),
      deepSleepMinutes: count().optional(),
      lightSleepMinutes: count().optional(),
      remSleepMinutes: count().optional(),
      awakeMinutes: count().optional(),
      sleepEfficiency: percentage().optional(),
      sleepQualityScore: z.number().int().min(1).max(10).optional(),
      notes: text(2000).optional(),
    })),
  },
  "nutrition-macros": {
    kind: "nutrition-macros",
    label: "Nutrition macros",
    ridTag: "macros",
    defaultSource: DATA_SOURCES.MANUAL,
    measurements: requireMeasurement(z.object({
      protein: nonNegative().optional(),
      carbs: nonNegative().optional(),
      fat: nonNegative().optional(),
      calories: nonNegative().optional(),
      mealName: text(100).optional(),
      notes: text(2000).optional(),
    })),
  },
};

export function getMetricDefinition(kind: MetricKind): MetricDefinition {
  return metricDefinitions[kind];
}
