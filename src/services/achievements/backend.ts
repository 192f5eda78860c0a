/**
 * Storage backends for achievement progress.
 *
 * A backend maps scope -> subject -> definition name -> level. It hands out
 * Achievement instances built from the stored level and the definition the
 * caller passes in, so progress always binds to the currently registered
 * definition (and its current goals). Levels stored under names that are no
 * longer registered are kept as they are.
 *
 * All backend methods are synchronous, which keeps a tracker's
 * fetch -> mutate -> persist sequence inside a single event-loop turn.
 */

import { Achievement } from "./achievement";
import type { AchievementDefinition } from "./definition";
import type { SubjectKey } from "./types";

/** Serializable form of the whole store. */
export type ProgressTree = Record<string, Record<string, Record<string, number>>>;

export interface AchievementBackend {
  /** Fetch the subject's progress, creating (and persisting) it at level 0 if missing. */
  achievementFor(subject: SubjectKey, definition: AchievementDefinition): Achievement;

  achievementsFor(subject: SubjectKey, definitions: readonly AchievementDefinition[]): Achievement[];

  setLevelFor(subject: SubjectKey, definition: AchievementDefinition, level: number): void;

  /** Every tracked subject, optionally restricted to one scope. */
  getTrackedIds(scopeId?: string): SubjectKey[];

  /** Drop all progress of a subject. Returns false if it was not tracked. */
  removeId(subject: SubjectKey): boolean;

  /** Drop all progress recorded in a scope. */
  wipeScope(scopeId: string): void;

  snapshot(): ProgressTree;
}

type SubjectLevels = Map<string, number>;
type ScopeSubjects = Map<string, SubjectLevels>;

/**
 * Backend holding everything in memory. Subclasses persist by overriding
 * `persist()`, which runs after every change.
 */
export class InMemoryAchievementBackend implements AchievementBackend {
  protected scopes = new Map<string, ScopeSubjects>();

  constructor(initial: ProgressTree = {}) {
    this.restore(initial);
  }

  achievementFor(subject: SubjectKey, definition: AchievementDefinition): Achievement {
    const levels = this.levelsOf(subject);
    const created = this.ensureEntry(levels, definition);
    if (created) {
      this.persist();
    }
    return new Achievement(definition, levels.get(definition.name));
  }

  achievementsFor(
    subject: SubjectKey,
    definitions: readonly AchievementDefinition[],
  ): Achievement[] {
    const levels = this.levelsOf(subject);
    let created = false;
    for (const definition of definitions) {
      created = this.ensureEntry(levels, definition) || created;
    }
    if (created) {
      this.persist();
    }
    return definitions.map((d) => new Achievement(d, levels.get(d.name)));
  }

  setLevelFor(subject: SubjectKey, definition: AchievementDefinition, level: number): void {
    this.levelsOf(subject).set(definition.name, level);
    this.persist();
  }

  getTrackedIds(scopeId?: string): SubjectKey[] {
    const ids: SubjectKey[] = [];
    for (const [scope, subjects] of this.scopes) {
      if (scopeId !== undefined && scope !== scopeId) continue;
      for (const subjectId of subjects.keys()) {
        ids.push({ scopeId: scope, subjectId });
      }
    }
    return ids;
  }

  removeId(subject: SubjectKey): boolean {
    const removed = this.scopes.get(subject.scopeId)?.delete(subject.subjectId) ?? false;
    if (removed) {
      this.persist();
    }
    return removed;
  }

  wipeScope(scopeId: string): void {
    this.scopes.delete(scopeId);
    this.persist();
  }

  /** Built with Object.fromEntries so ids such as "__proto__" stay own keys. */
  snapshot(): ProgressTree {
    return Object.fromEntries(
      [...this.scopes].map(([scopeId, subjects]) => [
        scopeId,
        Object.fromEntries(
          [...subjects].map(([subjectId, levels]) => [subjectId, Object.fromEntries(levels)]),
        ),
      ]),
    );
  }

  /** Called after every change; the in-memory backend keeps nothing durable. */
  protected persist(): void {}

  protected restore(tree: ProgressTree): void {
    this.scopes = new Map();
    for (const [scopeId, subjects] of Object.entries(tree)) {
      const scope: ScopeSubjects = new Map();
      for (const [subjectId, levels] of Object.entries(subjects)) {
        scope.set(subjectId, new Map(Object.entries(levels)));
      }
      this.scopes.set(scopeId, scope);
    }
  }

  private levelsOf(subject: SubjectKey): SubjectLevels {
    let scope = this.scopes.get(subject.scopeId);
    if (!scope) {
      scope = new Map();
      this.scopes.set(subject.scopeId, scope);
    }
    let levels = scope.get(subject.subjectId);
    if (!levels) {
      levels = new Map();
      scope.set(subject.subjectId, levels);
    }
    return levels;
  }

  private ensureEntry(levels: SubjectLevels, definition: AchievementDefinition): boolean {
    if (levels.has(definition.name)) {
      return false;
    }
    levels.set(definition.name, 0);
    return true;
  }
}
