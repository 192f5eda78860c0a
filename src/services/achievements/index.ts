/**
 * Achievement tracking engine.
 *
 * Usage:
 *   import { AchievementTracker, JsonFileAchievementBackend, defineAchievement } from "./achievements";
 *
 *   const tracker = new AchievementTracker({ backend: new JsonFileAchievementBackend(file) });
 *   tracker.register(defineAchievement({ name: "Messages", category: "chat", goals }));
 *   tracker.increment({ scopeId: serverId, subjectId: memberId }, "Messages");
 */

export { Achievement } from "./achievement";
export { AchievementDefinition, defineAchievement } from "./definition";
export type { AchievementDefinitionOptions } from "./definition";
export { GoalSet } from "./goalSet";
export { Signal, createAchievementSignals } from "./signals";
export type {
  AchievementSignals,
  ConnectOptions,
  DisconnectOptions,
  Receiver,
  RobustSignalResult,
  SignalPayload,
  SignalResult,
} from "./signals";
export { InMemoryAchievementBackend } from "./backend";
export type { AchievementBackend, ProgressTree } from "./backend";
export { JsonFileAchievementBackend } from "./jsonFileBackend";
export { AchievementTracker } from "./tracker";
export type { AchievementTrackerOptions } from "./tracker";
export { AlreadyRegisteredError, NotRegisteredError } from "./errors";
export type * from "./types";
