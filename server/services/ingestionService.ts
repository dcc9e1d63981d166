import { z } from "zod";
import { getMetricDefinition, type Measurements, type MetricKind } from "@shared/domain/metrics";
import { isKnownDataSource, MAX_SOURCE_LABEL_LENGTH, normalizeSourceLabel } from "@shared/dataSource";
import { normalizeTimestamp } from "@shared/utils/timestamps";
import type { MetricRecord } from "@shared/schema";
import type { IStorage, TimeRange } from "../storage";
import { ValidationError, type FieldError } from "../errors";
import { generateRid } from "../utils/rid";
import { logger } from "../logger";

export type IngestStatus = "inserted" | "updated";

export interface IngestResult {
  status: IngestStatus;
  record: MetricRecord;
}

export interface PointFailure {
  index: number;
  errors: FieldError[];
}

export interface BatchResult {
  records: MetricRecord[];
  createdCount: number;
  updatedCount: number;
  failures: PointFailure[];
  totalProcessed: number;
}

/** A validated point, ready to be written under its natural key. */
interface NormalizedPoint {
  recordedAt: Date;
  source: string;
  measurements: Measurements;
}

const envelopeSchema = z.object({
  date: z.union([z.string(), z.date()], {
    required_error: "date is required",
    invalid_type_error: "date must be an ISO-8601 string",
  }),
  source: z.string().optional(),
}).passthrough();

/**
 * Upsert-by-natural-key ingestion for every metric kind.
 *
 * Sync clients resend the same bucket repeatedly, so each point is keyed by
 * (user, kind, recordedAt, source) and written with a single atomic storage call.
 * Kind-specific validation and coercion live in the metric definitions.
 */
export class IngestionService {
  constructor(private readonly storage: IStorage) {}

  normalize(kind: MetricKind, point: unknown): NormalizedPoint {
    const definition = getMetricDefinition(kind);

    const envelope = envelopeSchema.safeParse(point);
    if (!envelope.success) {
      throw ValidationError.fromZod(envelope.error);
    }

    const { date, source, ...fields } = envelope.data;
    const errors: FieldError[] = [];

    const recordedAt = normalizeTimestamp(date);
    if (!recordedAt) {
      errors.push({ path: "date", message: "Invalid ISO-8601 timestamp" });
    }

    const sourceLabel = normalizeSourceLabel(source ?? definition.defaultSource ?? "");
    if (!sourceLabel) {
      errors.push({ path: "source", message: "source is required" });
    } else if (sourceLabel.length > MAX_SOURCE_LABEL_LENGTH) {
      errors.push({ path: "source", message: `source must be at most ${MAX_SOURCE_LABEL_LENGTH} characters` });
    }

    const measurements = definition.measurements.safeParse(fields);
    if (!measurements.success) {
      errors.push(...ValidationError.fromZod(measurements.error).errors);
    }

    if (errors.length > 0 || !recordedAt || !measurements.success) {
      throw new ValidationError(`Invalid ${definition.label.toLowerCase()} data point`, errors);
    }

    if (!isKnownDataSource(sourceLabel)) {
      logger.debug('[Ingestion] Unrecognized source label', { kind, source: sourceLabel });
    }

    return {
      recordedAt,
      source: sourceLabel,
      measurements: withoutUndefined(measurements.data),
    };
  }

  async ingest(userId: string, kind: MetricKind, point: unknown): Promise<IngestResult> {
    const normalized = this.normalize(kind, point);
    return await this.write(userId, kind, normalized);
  }

  /**
   * Each point is validated and written on its own. Invalid points are reported by
   * index and skipped; storage failures abort the remainder of the batch.
   */
  async ingestBatch(userId: string, kind: MetricKind, points: unknown[]): Promise<BatchResult> {
    const records: MetricRecord[] = [];
    const failures: PointFailure[] = [];
    let createdCount = 0;
    let updatedCount = 0;

    for (const [index, point] of points.entries()) {
      let normalized: NormalizedPoint;
      try {
        normalized = this.normalize(kind, point);
      } catch (error) {
        if (error instanceof ValidationError) {
          failures.push({ index, errors: error.errors });
          continue;
        }
        throw error;
      }

      const result = await this.write(userId, kind, normalized);
      records.push(result.record);
      if (result.status === "inserted") {
        createdCount++;
      } else {
        updatedCount++;
      }
    }

    if (points.length > 0 && failures.length === points.length) {
      throw new ValidationError(
        "No valid data points in batch",
        failures.flatMap((failure) => failure.errors.map((error) => ({
          path: error.path ? `records.${failure.index}.${error.path}` : `records.${failure.index}`,
          message: error.message,
        }))),
      );
    }

    logger.info(`[Ingestion] Batch processed for ${kind}`, {
      userId,
      createdCount,
      updatedCount,
      failedCount: failures.length,
    });

    return { records, createdCount, updatedCount, failures, totalProcessed: points.length };
  }

  async list(userId: string, kind: MetricKind, range: TimeRange = {}): Promise<MetricRecord[]> {
    return await this.storage.listMetricRecords(userId, kind, range);
  }

  async get(userId: string, kind: MetricKind, id: string): Promise<MetricRecord | undefined> {
    return await this.storage.getMetricRecord(userId, kind, id);
  }

  async remove(userId: string, kind: MetricKind, id: string): Promise<boolean> {
    return await this.storage.deleteMetricRecord(userId, kind, id);
  }

  private async write(userId: string, kind: MetricKind, point: NormalizedPoint): Promise<IngestResult> {
    const definition = getMetricDefinition(kind);
    const { record, inserted } = await this.storage.upsertMetricRecord({
      id: generateRid(definition.ridTag),
      userId,
      kind,
      recordedAt: point.recordedAt,
      source: point.source,
      measurements: point.measurements,
    });
    return { status: inserted ? "inserted" : "updated", record };
  }
}

function withoutUndefined(values: Partial<Measurements>): Measurements {
  const result: Measurements = {};
  for (const [key, value] of Object.entries(values)) {
    if (value !== undefined) {
      result[key] = value;
    }
  }
  return result;
}

/** Flattened JSON shape returned by the metric endpoints. */
export function serializeMetricRecord(record: MetricRecord) {
  return {
    id: record.id,
    userId: record.userId,
    kind: record.kind,
    recordedAt: record.recordedAt.toISOString(),
    source: record.source,
    ...record.measurements,
    createdAt: record.createdAt.toISOString(),
    updatedAt: record.updatedAt.toISOString(),
  };
}
