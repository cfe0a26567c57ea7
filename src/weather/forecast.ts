import type { ForecastEntry, ForecastSummary } from "./types.js";

type DayGroup = [ForecastEntry, ...ForecastEntry[]];

export function calendarDay(timestamp: string): string {
  return timestamp.trim().split(/[ T]/, 1)[0];
}

// Most frequent value; on a tie the one seen first wins.
function mode<K>(items: DayGroup, pick: (entry: ForecastEntry) => K): K {
  const counts = new Map<K, number>();
  for (const item of items) {
    const key = pick(item);
    counts.set(key, (counts.get(key) ?? 0) + 1);
  }

  let best = pick(items[0]);
  let bestCount = 0;
  for (const [key, count] of counts) {
    if (count > bestCount) {
      best = key;
      bestCount = count;
    }
  }
  return best;
}

function summarize(day: string, group: DayGroup): ForecastSummary {
  let minTemp = group[0].temperature;
  let maxTemp = group[0].temperature;
  for (const entry of group) {
    minTemp = Math.min(minTemp, entry.temperature);
    maxTemp = Math.max(maxTemp, entry.temperature);
  }

  return {
    calendarDay: day,
    minTemp,
    maxTemp,
    dominantDescription: mode(group, (e) => e.description),
    dominantConditionCode: mode(group, (e) => e.conditionCode)
  };
}

/**
 * Collapses 3-hour forecast slots into one summary per calendar day.
 *
 * Days come out in the order they first appear in `entries`, not sorted by date.
 * The returned generator can be consumed once.
 */
export function* aggregate(entries: Iterable<ForecastEntry>): Generator<ForecastSummary, void, undefined> {
  const groups = new Map<string, DayGroup>();
  for (const entry of entries) {
    const day = calendarDay(entry.timestamp);
    const group = groups.get(day);
    if (group) {
      group.push(entry);
    } else {
      groups.set(day, [entry]);
    }
  }

  for (const [day, group] of groups) {
    yield summarize(day, group);
  }
}
