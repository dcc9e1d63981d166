/**
 * Metric resource routes, one set per metric kind:
 *
 * - GET    /api/v1/metric/:kind         - list the caller's records (optional start/end)
 * - GET    /api/v1/metric/:kind/:id     - single record
 * - POST   /api/v1/metric/:kind         - upsert one data point
 * - POST   /api/v1/metric/:kind/bulk    - upsert many data points
 * - DELETE /api/v1/metric/:kind/:id     - delete a record
 */

import { Router } from "express";
import { METRIC_KINDS, getMetricDefinition, type MetricKind } from "@shared/domain/metrics";
import { bulkIngestSchema, metricRangeQuerySchema } from "@shared/schema";
import { normalizeTimestamp } from "@shared/utils/timestamps";
import type { AppContext } from "../context";
import { currentUser } from "../middleware/auth";
import { serializeMetricRecord } from "../services/ingestionService";
import type { TimeRange } from "../storage";
import { parseOrThrow } from "../utils/validation";
import { isRid } from "../utils/rid";
import { NotFoundError, ValidationError } from "../errors";
import { logger } from "../logger";

function parseRange(query: unknown): TimeRange {
  const { start, end } = parseOrThrow(metricRangeQuerySchema, query);
  const range: TimeRange = {
    start: start ? normalizeTimestamp(start) ?? undefined : undefined,
    end: end ? normalizeTimestamp(end) ?? undefined : undefined,
  };
  if (range.start && range.end && range.start > range.end) {
    throw new ValidationError("start must not be after end", [
      { path: "start", message: "start must not be after end" },
    ]);
  }
  return range;
}

function registerKind(router: Router, ctx: AppContext, kind: MetricKind): void {
  const base = `/api/v1/metric/${kind}`;
  const { label, ridTag } = getMetricDefinition(kind);
  const notFound = () => new NotFoundError(`${label} record not found`);

  router.get(base, ctx.authenticate, async (req, res, next) => {
    try {
      const userId = currentUser(req).id;
      const records = await ctx.ingestion.list(userId, kind, parseRange(req.query));
      logger.debug(`[Metrics] Retrieved ${records.length} ${kind} records`, { userId });
      res.json({
        records: records.map(serializeMetricRecord),
        totalCount: records.length,
        userId,
      });
    } catch (error) {
      next(error);
    }
  });

  router.post(`${base}/bulk`, ctx.authenticate, async (req, res, next) => {
    try {
      const userId = currentUser(req).id;
      const { records } = parseOrThrow(bulkIngestSchema, req.body);
      const result = await ctx.ingestion.ingestBatch(userId, kind, records);
      res.json({
        message: `Bulk operation completed: ${result.createdCount} created, ${result.updatedCount} updated, ${result.failures.length} failed`,
        createdCount: result.createdCount,
        updatedCount: result.updatedCount,
        failedCount: result.failures.length,
        totalProcessed: result.totalProcessed,
        records: result.records.map(serializeMetricRecord),
        errors: result.failures,
      });
    } catch (error) {
      next(error);
    }
  });

  router.post(base, ctx.authenticate, async (req, res, next) => {
    try {
      const userId = currentUser(req).id;
      const { status, record } = await ctx.ingestion.ingest(userId, kind, req.body);
      res.status(status === "inserted" ? 201 : 200).json({
        status,
        record: serializeMetricRecord(record),
      });
    } catch (error) {
      next(error);
    }
  });

  router.get(`${base}/:id`, ctx.authenticate, async (req, res, next) => {
    try {
      const userId = currentUser(req).id;
      if (!isRid(req.params.id, ridTag)) {
        throw notFound();
      }
      const record = await ctx.ingestion.get(userId, kind, req.params.id);
      if (!record) {
        throw notFound();
      }
      res.json(serializeMetricRecord(record));
    } catch (error) {
      next(error);
    }
  });

  router.delete(`${base}/:id`, ctx.authenticate, async (req, res, next) => {
    try {
      const userId = currentUser(req).id;
      if (!isRid(req.params.id, ridTag) || !(await ctx.ingestion.remove(userId, kind, req.params.id))) {
        throw notFound();
      }
      logger.info(`[Metrics] Deleted ${kind} record`, { userId, recordId: req.params.id });
      res.json({ message: `${label} record deleted successfully`, deletedCount: 1 });
    } catch (error) {
      next(error);
    }
  });
}

export function createMetricsRouter(ctx: AppContext): Router {
  const router = Router();
  for (const kind of METRIC_KINDS) {
    registerKind(router, ctx, kind);
  }
  return router;
}
