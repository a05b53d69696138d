import { formatStats, type SessionResult, type Username } from "./core.js";

const HEADLINES: Readonly<Record<SessionResult["outcome"], string>> = {
  finished: "Race finished",
  forfeited: "You left the race",
  aborted: "Session aborted",
  cancelled: "Session cancelled",
  rejected: "The host did not admit you to the race",
};

/** Plain-text summary printed once the terminal is restored */
export function formatResult(result: SessionResult, localUser: Username): string {
  const lines = [HEADLINES[result.outcome]];
  if (result.error) {
    lines.push(`Reason: ${result.error.message}`);
  }

  lines.push("", formatStats(result.stats));

  if (result.ranking) {
    lines.push("", "Ranking:");
    if (result.ranking.names.length === 0) {
      lines.push("  nobody finished");
    }
    result.ranking.names.forEach((name, index) => {
      lines.push(`  ${index + 1}. ${name}${name === localUser ? " (you)" : ""}`);
    });
  }

  if (result.saved !== undefined) {
    lines.push("", result.saved ? "Record saved." : "Record not saved.");
  }

  return lines.join("\n");
}
