import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { defineAchievement, type AchievementDefinition } from "../services/achievements";

/** Fresh data directory under the OS temp dir. */
export function makeTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), "guild-loyalty-"));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

export function readJsonFile(filePath: string): unknown {
  return JSON.parse(fs.readFileSync(filePath, "utf8"));
}

/** Two-goal definition: "Chatter" at 1, "Centurion" at 100. */
export function messagesDefinition(name = "Messages"): AchievementDefinition {
  return defineAchievement({
    name,
    category: "chat",
    keywords: ["messages", "activity"],
    goals: [
      { level: 1, name: "Chatter", description: "Send your first message" },
      { level: 100, name: "Centurion", description: "Send 100 messages" },
    ],
  });
}
