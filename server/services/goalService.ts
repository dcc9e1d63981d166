import type {
  GoalGeneral,
  GoalMacros,
  GoalWeight,
  UpsertGoalGeneral,
  UpsertGoalMacros,
  UpsertGoalWeight,
} from "@shared/schema";
import { normalizeTimestamp } from "@shared/utils/timestamps";
import type { IStorage } from "../storage";
import { NotFoundError, ValidationError } from "../errors";
import { generateRid } from "../utils/rid";
import { logger } from "../logger";

const GOAL_TAG = "goal";

function toInstant(value: string, path: string): Date {
  const parsed = normalizeTimestamp(value);
  if (!parsed) {
    throw new ValidationError("Invalid goal", [{ path, message: "Invalid ISO-8601 timestamp" }]);
  }
  return parsed;
}

/**
 * PUT semantics: a goal is replaced wholesale, so omitted optional fields are cleared.
 * The RID of an existing goal survives the replacement.
 */
export class GoalService {
  constructor(private readonly storage: IStorage) {}

  async getGeneral(userId: string): Promise<GoalGeneral> {
    const goal = await this.storage.getGoalGeneral(userId);
    if (!goal) {
      throw new NotFoundError("General goal not found");
    }
    return goal;
  }

  async saveGeneral(userId: string, data: UpsertGoalGeneral): Promise<GoalGeneral> {
    const goal = await this.storage.upsertGoalGeneral({
      id: generateRid(GOAL_TAG),
      userId,
      goalDescription: data.goalDescription,
      targetDate: data.targetDate ? toInstant(data.targetDate, "targetDate") : null,
      targetWeight: data.targetWeight ?? null,
      targetBodyFatPercentage: data.targetBodyFatPercentage ?? null,
      targetMuscleMassPercentage: data.targetMuscleMassPercentage ?? null,
    });
    logger.info('[Goals] Saved general goal', { userId, goalId: goal.id });
    return goal;
  }

  async deleteGeneral(userId: string): Promise<void> {
    if (!(await this.storage.deleteGoalGeneral(userId))) {
      throw new NotFoundError("General goal not found");
    }
  }

  async getMacros(userId: string): Promise<GoalMacros> {
    const goal = await this.storage.getGoalMacros(userId);
    if (!goal) {
      throw new NotFoundError("Macro goal not found");
    }
    return goal;
  }

  async saveMacros(userId: string, data: UpsertGoalMacros): Promise<GoalMacros> {
    const goal = await this.storage.upsertGoalMacros({
      id: generateRid(GOAL_TAG),
      userId,
      calories: data.calories ?? null,
      protein: data.protein ?? null,
      carbs: data.carbs ?? null,
      fat: data.fat ?? null,
      calorieDeficit: data.calorieDeficit ?? null,
    });
    logger.info('[Goals] Saved macro goal', { userId, goalId: goal.id });
    return goal;
  }

  async deleteMacros(userId: string): Promise<void> {
    if (!(await this.storage.deleteGoalMacros(userId))) {
      throw new NotFoundError("Macro goal not found");
    }
  }

  async listWeight(userId: string): Promise<GoalWeight[]> {
    return await this.storage.listGoalWeights(userId);
  }

  async saveWeight(userId: string, data: UpsertGoalWeight): Promise<GoalWeight> {
    const goal = await this.storage.upsertGoalWeight({
      id: generateRid(GOAL_TAG),
      userId,
      targetDate: toInstant(data.targetDate, "targetDate"),
      weight: data.weight ?? null,
      bodyFatPercentage: data.bodyFatPercentage ?? null,
      muscleMassPercentage: data.muscleMassPercentage ?? null,
    });
    logger.info('[Goals] Saved weight goal', { userId, goalId: goal.id });
    return goal;
  }

  async deleteWeight(userId: string, id: string): Promise<void> {
    if (!(await this.storage.deleteGoalWeight(userId, id))) {
      throw new NotFoundError("Weight goal not found");
    }
  }
}
