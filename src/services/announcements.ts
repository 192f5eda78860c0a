/**
 * Announcement feed fed by tracker signals.
 *
 * `attach` connects receivers to a tracker's signals (filtered on that
 * tracker as sender). Each level-up, goal and top-rank event becomes an
 * announcement in a per-server feed capped at `limit` entries, newest first.
 */

import { logger } from "../config/logger";
import type {
  AchievementTracker,
  GoalsAchievedEvent,
  ProgressEvent,
  SignalPayload,
} from "./achievements";

export type AnnouncementKind = "level_increased" | "goal_achieved" | "highest_level_achieved";

export interface Announcement {
  kind: AnnouncementKind;
  serverId: string;
  memberId: string;
  achievement: string;
  level: number;
  message: string;
  createdAt: string;
}

const DISPATCH_PREFIX = "announcements";

export class AnnouncementFeed {
  private readonly feeds = new Map<string, Announcement[]>();

  constructor(private readonly limit = 50) {}

  attach(tracker: AchievementTracker): void {
    const { levelIncreased, goalAchieved, highestLevelAchieved } = tracker.signals;

    levelIncreased.connect((event) => this.onLevelIncreased(event), {
      sender: tracker,
      dispatchUid: `${DISPATCH_PREFIX}:levelIncreased`,
    });
    goalAchieved.connect((event) => this.onGoalAchieved(event), {
      sender: tracker,
      dispatchUid: `${DISPATCH_PREFIX}:goalAchieved`,
    });
    highestLevelAchieved.connect((event) => this.onHighestLevel(event), {
      sender: tracker,
      dispatchUid: `${DISPATCH_PREFIX}:highestLevelAchieved`,
    });
  }

  detach(tracker: AchievementTracker): void {
    const { levelIncreased, goalAchieved, highestLevelAchieved } = tracker.signals;
    levelIncreased.disconnect({ sender: tracker, dispatchUid: `${DISPATCH_PREFIX}:levelIncreased` });
    goalAchieved.disconnect({ sender: tracker, dispatchUid: `${DISPATCH_PREFIX}:goalAchieved` });
    highestLevelAchieved.disconnect({
      sender: tracker,
      dispatchUid: `${DISPATCH_PREFIX}:highestLevelAchieved`,
    });
  }

  /** Newest first. */
  recent(serverId: string, count = this.limit): Announcement[] {
    return (this.feeds.get(serverId) ?? []).slice(0, count);
  }

  private onLevelIncreased(event: SignalPayload<ProgressEvent>): void {
    const { level } = event.achievement.current;
    this.push(event, "level_increased", `is now at ${level} ${event.achievement.definition.title}`);
  }

  private onGoalAchieved(event: SignalPayload<GoalsAchievedEvent>): void {
    for (const goal of event.goals) {
      this.push(event, "goal_achieved", `reached ${goal.name}: ${goal.description}`);
    }
  }

  private onHighestLevel(event: SignalPayload<ProgressEvent>): void {
    this.push(
      event,
      "highest_level_achieved",
      `completed every ${event.achievement.definition.title} goal`,
    );
  }

  private push(event: ProgressEvent, kind: AnnouncementKind, text: string): void {
    const { subject, achievement } = event;
    const announcement: Announcement = {
      kind,
      serverId: subject.scopeId,
      memberId: subject.subjectId,
      achievement: achievement.name,
      level: achievement.current.level,
      message: `${subject.subjectId} ${text}`,
      createdAt: new Date().toISOString(),
    };

    const feed = this.feeds.get(subject.scopeId) ?? [];
    feed.unshift(announcement);
    feed.length = Math.min(feed.length, this.limit);
    this.feeds.set(subject.scopeId, feed);

    logger.debug("announcements", announcement.message, { kind, serverId: subject.scopeId });
  }
}
