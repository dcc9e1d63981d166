import {
  users,
  metricRecords,
  goalGeneral,
  goalMacros,
  goalWeight,
  chatConversations,
  chatMessages,
  type User,
  type InsertUser,
  type MetricRecord,
  type InsertMetricRecord,
  type GoalGeneral,
  type InsertGoalGeneral,
  type GoalMacros,
  type InsertGoalMacros,
  type GoalWeight,
  type InsertGoalWeight,
  type ChatConversation,
  type InsertChatConversation,
  type ChatMessage,
  type InsertChatMessage,
} from "@shared/schema";
import type { MetricKind } from "@shared/domain/metrics";
import type { Database } from "./db";
import { and, asc, desc, eq, gte, lte, sql, getTableColumns } from "drizzle-orm";

export type UserUpdate = Partial<Pick<User, "fullName" | "isActive" | "isAdmin" | "passwordHash">>;

export interface TimeRange {
  start?: Date;
  end?: Date;
}

export interface UpsertResult<T> {
  record: T;
  inserted: boolean;
}

// Interface for storage operations
export interface IStorage {
  // User operations
  getUser(id: string): Promise<User | undefined>;
  getUserByEmail(email: string): Promise<User | undefined>;
  /** Returns undefined when the e-mail is already registered. */
  createUser(user: InsertUser): Promise<User | undefined>;
  updateUser(id: string, data: UserUpdate): Promise<User | undefined>;
  listUsers(): Promise<User[]>;

  // Metric operations
  /**
   * Insert or merge a record on (userId, kind, recordedAt, source). On conflict the existing
   * id is kept and the incoming measurements overwrite matching keys.
   */
  upsertMetricRecord(record: InsertMetricRecord): Promise<UpsertResult<MetricRecord>>;
  getMetricRecord(userId: string, kind: MetricKind, id: string): Promise<MetricRecord | undefined>;
  listMetricRecords(userId: string, kind: MetricKind, range?: TimeRange): Promise<MetricRecord[]>;
  deleteMetricRecord(userId: string, kind: MetricKind, id: string): Promise<boolean>;

  // Goal operations
  getGoalGeneral(userId: string): Promise<GoalGeneral | undefined>;
  upsertGoalGeneral(goal: InsertGoalGeneral): Promise<GoalGeneral>;
  deleteGoalGeneral(userId: string): Promise<boolean>;
  getGoalMacros(userId: string): Promise<GoalMacros | undefined>;
  upsertGoalMacros(goal: InsertGoalMacros): Promise<GoalMacros>;
  deleteGoalMacros(userId: string): Promise<boolean>;
  listGoalWeights(userId: string): Promise<GoalWeight[]>;
  upsertGoalWeight(goal: InsertGoalWeight): Promise<GoalWeight>;
  deleteGoalWeight(userId: string, id: string): Promise<boolean>;

  // Chat operations
  createConversation(conversation: InsertChatConversation): Promise<ChatConversation>;
  getConversation(userId: string, id: string): Promise<ChatConversation | undefined>;
  getLatestActiveConversation(userId: string): Promise<ChatConversation | undefined>;
  listConversations(userId: string): Promise<ChatConversation[]>;
  touchConversation(id: string): Promise<void>;
  addChatMessage(message: InsertChatMessage): Promise<ChatMessage>;
  /** Oldest first. With `limit`, only the most recent `limit` messages. */
  listChatMessages(conversationId: string, limit?: number): Promise<ChatMessage[]>;
}

export class DatabaseStorage implements IStorage {
  constructor(private readonly db: Database) {}

  // ==================== USERS ====================

  async getUser(id: string): Promise<User | undefined> {
    const [user] = await this.db.select().from(users).where(eq(users.id, id));
    return user;
  }

  async getUserByEmail(email: string): Promise<User | undefined> {
    const [user] = await this.db.select().from(users).where(eq(users.email, email.toLowerCase()));
    return user;
  }

  async createUser(userData: InsertUser): Promise<User | undefined> {
    const [user] = await this.db
      .insert(users)
      .values({ ...userData, email: userData.email.toLowerCase() })
      .onConflictDoNothing({ target: users.email })
      .returning();
    return user;
  }

  async updateUser(id: string, data: UserUpdate): Promise<User | undefined> {
    const [user] = await this.db
      .update(users)
      .set({
        ...data,
        updatedAt: new Date(),
      })
      .where(eq(users.id, id))
      .returning();
    return user;
  }

  async listUsers(): Promise<User[]> {
    return await this.db.select().from(users).orderBy(asc(users.createdAt));
  }

  // ==================== METRICS ====================

  async upsertMetricRecord(record: InsertMetricRecord): Promise<UpsertResult<MetricRecord>> {
    const [row] = await this.metricUpsertQuery(record);
    const { inserted, ...stored } = row;
    return { record: stored, inserted };
  }

  /** The single INSERT ... ON CONFLICT statement behind upsertMetricRecord. */
  metricUpsertQuery(record: InsertMetricRecord) {
    return this.db
      .insert(metricRecords)
      .values(record)
      .onConflictDoUpdate({
        target: [metricRecords.userId, metricRecords.kind, metricRecords.recordedAt, metricRecords.source],
        set: {
          measurements: sql`${metricRecords.measurements} || excluded.measurements`,
          updatedAt: new Date(),
        },
      })
      .returning({
        ...getTableColumns(metricRecords),
        // xmax is 0 only for a freshly inserted tuple
        inserted: sql<boolean>`(xmax = 0)`,
      });
  }

  async getMetricRecord(userId: string, kind: MetricKind, id: string): Promise<MetricRecord | undefined> {
    const [record] = await this.db
      .select()
      .from(metricRecords)
      .where(and(
        eq(metricRecords.id, id),
        eq(metricRecords.userId, userId),
        eq(metricRecords.kind, kind),
      ));
    return record;
  }

  async listMetricRecords(userId: string, kind: MetricKind, range: TimeRange = {}): Promise<MetricRecord[]> {
    const conditions = [eq(metricRecords.userId, userId), eq(metricRecords.kind, kind)];
    if (range.start) {
      conditions.push(gte(metricRecords.recordedAt, range.start));
    }
    if (range.end) {
      conditions.push(lte(metricRecords.recordedAt, range.end));
    }

    return await this.db
      .select()
      .from(metricRecords)
      .where(and(...conditions))
      .orderBy(desc(metricRecords.recordedAt));
  }

  async deleteMetricRecord(userId: string, kind: MetricKind, id: string): Promise<boolean> {
    const deleted = await this.db
      .delete(metricRecords)
      .where(and(
        eq(metricRecords.id, id),
        eq(metricRecords.userId, userId),
        eq(metricRecords.kind, kind),
      ))
      .returning({ id: metricRecords.id });
    return deleted.length > 0;
  }

  // ==================== GOALS ====================

  async getGoalGeneral(userId: string): Promise<GoalGeneral | undefined> {
    const [goal] = await this.db.select().from(goalGeneral).where(eq(goalGeneral.userId, userId));
    return goal;
  }

  async upsertGoalGeneral(goal: InsertGoalGeneral): Promise<GoalGeneral> {
    const [saved] = await this.goalGeneralUpsertQuery(goal);
    return saved;
  }

  goalGeneralUpsertQuery(goal: InsertGoalGeneral) {
    const { id: _id, userId: _userId, createdAt: _createdAt, ...fields } = goal;
    return this.db
      .insert(goalGeneral)
      .values(goal)
      .onConflictDoUpdate({
        target: goalGeneral.userId,
        set: {
          ...fields,
          updatedAt: new Date(),
        },
      })
      .returning();
  }

  async deleteGoalGeneral(userId: string): Promise<boolean> {
    const deleted = await this.db
      .delete(goalGeneral)
      .where(eq(goalGeneral.userId, userId))
      .returning({ id: goalGeneral.id });
    return deleted.length > 0;
  }

  async getGoalMacros(userId: string): Promise<GoalMacros | undefined> {
    const [goal] = await this.db.select().from(goalMacros).where(eq(goalMacros.userId, userId));
    return goal;
  }

  async upsertGoalMacros(goal: InsertGoalMacros): Promise<GoalMacros> {
    const [saved] = await this.goalMacrosUpsertQuery(goal);
    return saved;
  }

  goalMacrosUpsertQuery(goal: InsertGoalMacros) {
    const { id: _id, userId: _userId, createdAt: _createdAt, ...fields } = goal;
    return this.db
      .insert(goalMacros)
      .values(goal)
      .onConflictDoUpdate({
        target: goalMacros.userId,
        set: {
          ...fields,
          updatedAt: new Date(),
        },
      })
      .returning();
  }

  async deleteGoalMacros(userId: string): Promise<boolean> {
    const deleted = await this.db
      .delete(goalMacros)
      .where(eq(goalMacros.userId, userId))
      .returning({ id: goalMacros.id });
    return deleted.length > 0;
  }

  async listGoalWeights(userId: string): Promise<GoalWeight[]> {
    return await this.db
      .select()
      .from(goalWeight)
      .where(eq(goalWeight.userId, userId))
      .orderBy(asc(goalWeight.targetDate));
  }

  async upsertGoalWeight(goal: InsertGoalWeight): Promise<GoalWeight> {
    const [saved] = await this.goalWeightUpsertQuery(goal);
    return saved;
  }

  goalWeightUpsertQuery(goal: InsertGoalWeight) {
    const { id: _id, userId: _userId, targetDate: _targetDate, createdAt: _createdAt, ...fields } = goal;
    return this.db
      .insert(goalWeight)
      .values(goal)
      .onConflictDoUpdate({
        target: [goalWeight.userId, goalWeight.targetDate],
        set: {
          ...fields,
          updatedAt: new Date(),
        },
      })
      .returning();
  }

  async deleteGoalWeight(userId: string, id: string): Promise<boolean> {
    const deleted = await this.db
      .delete(goalWeight)
      .where(and(eq(goalWeight.id, id), eq(goalWeight.userId, userId)))
      .returning({ id: goalWeight.id });
    return deleted.length > 0;
  }

  // ==================== CHAT ====================

  async createConversation(conversation: InsertChatConversation): Promise<ChatConversation> {
    const [created] = await this.db.insert(chatConversations).values(conversation).returning();
    return created;
  }

  async getConversation(userId: string, id: string): Promise<ChatConversation | undefined> {
    const [conversation] = await this.db
      .select()
      .from(chatConversations)
      .where(and(eq(chatConversations.id, id), eq(chatConversations.userId, userId)));
    return conversation;
  }

  async getLatestActiveConversation(userId: string): Promise<ChatConversation | undefined> {
    const [conversation] = await this.db
      .select()
      .from(chatConversations)
      .where(and(eq(chatConversations.userId, userId), eq(chatConversations.status, "active")))
      .orderBy(desc(chatConversations.updatedAt))
      .limit(1);
    return conversation;
  }

  async listConversations(userId: string): Promise<ChatConversation[]> {
    return await this.db
      .select()
      .from(chatConversations)
      .where(eq(chatConversations.userId, userId))
      .orderBy(desc(chatConversations.updatedAt));
  }

  async touchConversation(id: string): Promise<void> {
    await this.db
      .update(chatConversations)
      .set({ updatedAt: new Date() })
      .where(eq(chatConversations.id, id));
  }

  async addChatMessage(message: InsertChatMessage): Promise<ChatMessage> {
    const [created] = await this.db.insert(chatMessages).values(message).returning();
    return created;
  }

  async listChatMessages(conversationId: string, limit?: number): Promise<ChatMessage[]> {
    if (limit === undefined) {
      return await this.db
        .select()
        .from(chatMessages)
        .where(eq(chatMessages.conversationId, conversationId))
        .orderBy(asc(chatMessages.createdAt));
    }

    const recent = await this.db
      .select()
      .from(chatMessages)
      .where(eq(chatMessages.conversationId, conversationId))
      .orderBy(desc(chatMessages.createdAt))
      .limit(limit);
    return recent.reverse();
  }
}
