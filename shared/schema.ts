import {
  boolean,
  index,
  jsonb,
  pgTable,
  real,
  text,
  timestamp,
  uniqueIndex,
  varchar,
} from "drizzle-orm/pg-core";
import { createInsertSchema } from "drizzle-zod";
import { z } from "zod";
import type { Measurements, MetricKind } from "./domain/metrics";
import { normalizeTimestamp } from "./utils/timestamps";

// ==================== TABLES ====================

// Identity record. Email is stored lower-cased so the unique index is case-insensitive.
export const users = pgTable("users", {
  id: varchar("id").primaryKey(), // RID, tag "user"
  email: varchar("email").notNull().unique(),
  passwordHash: text("password_hash").notNull(), // bcrypt hash
  fullName: varchar("full_name"),
  isActive: boolean("is_active").default(true).notNull(),
  isAdmin: boolean("is_admin").default(false).notNull(),
  createdAt: timestamp("created_at", { withTimezone: true }).defaultNow().notNull(),
  updatedAt: timestamp("updated_at", { withTimezone: true }).defaultNow().notNull(),
});

// Time-series measurements for every metric kind. One row per (user, kind, instant, source).
export const metricRecords = pgTable("metric_records", {
  id: varchar("id").primaryKey(),
  userId: varchar("user_id").notNull().references(() => users.id, { onDelete: "cascade" }),
  kind: text("kind").$type<MetricKind>().notNull(),
  recordedAt: timestamp("recorded_at", { withTimezone: true }).notNull(),
  source: varchar("source", { length: 100 }).notNull(), // Device/app that produced the data
  measurements: jsonb("measurements").$type<Measurements>().notNull(),
  createdAt: timestamp("created_at", { withTimezone: true }).defaultNow().notNull(),
  updatedAt: timestamp("updated_at", { withTimezone: true }).defaultNow().notNull(),
}, (table) => [
  uniqueIndex("metric_records_natural_key_idx").on(table.userId, table.kind, table.recordedAt, table.source),
  index("metric_records_user_kind_time_idx").on(table.userId, table.kind, table.recordedAt),
]);

export const goalGeneral = pgTable("goal_general", {
  id: varchar("id").primaryKey(),
  userId: varchar("user_id").notNull().unique().references(() => users.id, { onDelete: "cascade" }),
  goalDescription: text("goal_description").notNull(),
  targetDate: timestamp("target_date", { withTimezone: true }),
  targetWeight: real("target_weight"), // kg or lbs, client's unit
  targetBodyFatPercentage: real("target_body_fat_percentage"),
  targetMuscleMassPercentage: real("target_muscle_mass_percentage"),
  createdAt: timestamp("created_at", { withTimezone: true }).defaultNow().notNull(),
  updatedAt: timestamp("updated_at", { withTimezone: true }).defaultNow().notNull(),
});

export const goalMacros = pgTable("goal_macros", {
  id: varchar("id").primaryKey(),
  userId: varchar("user_id").notNull().unique().references(() => users.id, { onDelete: "cascade" }),
  calories: real("calories"),
  protein: real("protein"), // grams
  carbs: real("carbs"), // grams
  fat: real("fat"), // grams
  calorieDeficit: real("calorie_deficit"),
  createdAt: timestamp("created_at", { withTimezone: true }).defaultNow().notNull(),
  updatedAt: timestamp("updated_at", { withTimezone: true }).defaultNow().notNull(),
});

export const goalWeight = pgTable("goal_weight", {
  id: varchar("id").primaryKey(),
  userId: varchar("user_id").notNull().references(() => users.id, { onDelete: "cascade" }),
  targetDate: timestamp("target_date", { withTimezone: true }).notNull(),
  weight: real("weight"),
  bodyFatPercentage: real("body_fat_percentage"),
  muscleMassPercentage: real("muscle_mass_percentage"),
  createdAt: timestamp("created_at", { withTimezone: true }).defaultNow().notNull(),
  updatedAt: timestamp("updated_at", { withTimezone: true }).defaultNow().notNull(),
}, (table) => [
  uniqueIndex("goal_weight_user_date_idx").on(table.userId, table.targetDate),
]);

export const chatConversations = pgTable("chat_conversations", {
  id: varchar("id").primaryKey(),
  userId: varchar("user_id").notNull().references(() => users.id, { onDelete: "cascade" }),
  title: varchar("title", { length: 120 }).notNull(),
  status: varchar("status").$type<"active" | "archived">().default("active").notNull(),
  createdAt: timestamp("created_at", { withTimezone: true }).defaultNow().notNull(),
  updatedAt: timestamp("updated_at", { withTimezone: true }).defaultNow().notNull(),
}, (table) => [
  index("chat_conversations_user_idx").on(table.userId, table.updatedAt),
]);

export const chatMessages = pgTable("chat_messages", {
  id: varchar("id").primaryKey(),
  conversationId: varchar("conversation_id").notNull().references(() => chatConversations.id, { onDelete: "cascade" }),
  userId: varchar("user_id").notNull().references(() => users.id, { onDelete: "cascade" }),
  role: varchar("role").$type<ChatRole>().notNull(),
  content: text("content").notNull(),
  createdAt: timestamp("created_at", { withTimezone: true }).defaultNow().notNull(),
}, (table) => [
  index("chat_messages_conversation_idx").on(table.conversationId, table.createdAt),
]);

// ==================== ROW TYPES ====================

export type User = typeof users.$inferSelect;
export type InsertUser = typeof users.$inferInsert;
export type MetricRecord = typeof metricRecords.$inferSelect;
export type InsertMetricRecord = typeof metricRecords.$inferInsert;
export type GoalGeneral = typeof goalGeneral.$inferSelect;
export type InsertGoalGeneral = typeof goalGeneral.$inferInsert;
export type GoalMacros = typeof goalMacros.$inferSelect;
export type InsertGoalMacros = typeof goalMacros.$inferInsert;
export type GoalWeight = typeof goalWeight.$inferSelect;
export type InsertGoalWeight = typeof goalWeight.$inferInsert;
export type ChatConversation = typeof chatConversations.$inferSelect;
export type InsertChatConversation = typeof chatConversations.$inferInsert;
export type ChatMessage = typeof chatMessages.$inferSelect;
export type InsertChatMessage = typeof chatMessages.$inferInsert;

export type ChatRole = "system" | "user" | "assistant";

// ==================== REQUEST SCHEMAS ====================

const isoInstant = z.string().trim().min(1).refine(
  (value) => normalizeTimestamp(value) !== null,
  { message: "Invalid ISO-8601 timestamp" },
);

// bcrypt only reads the first 72 bytes of a password
export const passwordSchema = z.string()
  .min(8, "Password must be at least 8 characters")
  .refine((value) => Buffer.byteLength(value, "utf8") <= 72, {
    message: "Password must be at most 72 bytes",
  });

export const signupSchema = z.object({
  email: z.string().trim().email().max(254),
  password: passwordSchema,
  fullName: z.string().trim().min(1).max(100).optional(),
});

// Accepts JSON { email, password } and OAuth2 password-grant forms { username, password }
export const signinSchema = z.preprocess(
  (body) => {
    if (body && typeof body === "object" && !("email" in body) && "username" in body) {
      return { ...body, email: body.username };
    }
    return body;
  },
  z.object({
    email: z.string().trim().email(),
    password: z.string().min(1),
  }),
);

export const updateProfileSchema = z.object({
  fullName: z.string().trim().min(1).max(100).nullable(),
});

export const updateUserStatusSchema = z.object({
  isActive: z.boolean().optional(),
  isAdmin: z.boolean().optional(),
}).refine((data) => data.isActive !== undefined || data.isAdmin !== undefined, {
  message: "Provide isActive and/or isAdmin",
});

export const metricRangeQuerySchema = z.object({
  start: isoInstant.optional(),
  end: isoInstant.optional(),
});

export const MAX_BULK_POINTS = 1000;

export const bulkIngestSchema = z.object({
  records: z.array(z.unknown()).min(1).max(MAX_BULK_POINTS),
});

const goalFieldOverrides = {
  targetDate: isoInstant.nullish(),
};

export const upsertGoalGeneralSchema = createInsertSchema(goalGeneral, {
  goalDescription: z.string().trim().min(1).max(2000),
  targetWeight: z.number().finite().min(0).nullish(),
  targetBodyFatPercentage: z.number().finite().min(0).max(100).nullish(),
  targetMuscleMassPercentage: z.number().finite().min(0).max(100).nullish(),
}).omit({
  id: true,
  userId: true,
  targetDate: true,
  createdAt: true,
  updatedAt: true,
}).extend(goalFieldOverrides);

export const upsertGoalMacrosSchema = createInsertSchema(goalMacros, {
  calories: z.number().finite().min(0).nullish(),
  protein: z.number().finite().min(0).nullish(),
  carbs: z.number().finite().min(0).nullish(),
  fat: z.number().finite().min(0).nullish(),
  calorieDeficit: z.number().finite().min(0).nullish(),
}).omit({
  id: true,
  userId: true,
  createdAt: true,
  updatedAt: true,
}).refine(
  (data) => [data.calories, data.protein, data.carbs, data.fat, data.calorieDeficit].some((value) => value != null),
  { message: "At least one macro target is required" },
);

export const upsertGoalWeightSchema = createInsertSchema(goalWeight, {
  weight: z.number().finite().min(0).nullish(),
  bodyFatPercentage: z.number().finite().min(0).max(100).nullish(),
  muscleMassPercentage: z.number().finite().min(0).max(100).nullish(),
}).omit({
  id: true,
  userId: true,
  targetDate: true,
  createdAt: true,
  updatedAt: true,
}).extend({
  targetDate: isoInstant,
});

export const chatRequestSchema = z.object({
  message: z.string().trim().min(1).max(4000),
  conversationId: z.string().trim().min(1).optional(),
});

export type Signup = z.infer<typeof signupSchema>;
export type UpsertGoalGeneral = z.infer<typeof upsertGoalGeneralSchema>;
export type UpsertGoalMacros = z.infer<typeof upsertGoalMacrosSchema>;
export type UpsertGoalWeight = z.infer<typeof upsertGoalWeightSchema>;
