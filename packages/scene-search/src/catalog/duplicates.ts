/**
 * Duplicate resolution
 *
 * Reprocessing leaves several products of one acquisition in a catalog.
 * They share the instrument token and start/stop times in their names and
 * differ in the unique id. Only the most recently processed one is kept.
 */

import { readProcessingTime } from '../scenes/manifest.js';
import { duplicateKey } from '../scenes/scene-name.js';

export type ProcessingTimeReader = (scene: string) => Promise<Date>;

/**
 * Collapse duplicate groups to their latest-processed member
 *
 * Identical locations collapse to one. Locations are sorted first, which
 * makes duplicates adjacent regardless of input order. Groups keep their sorted order; on equal processing times the
 * first member wins. Locations without a recognizable name form their own group.
 *
 * @throws ManifestReadError when a group member's manifest is unreadable
 */
export async function filterDuplicates(
  scenes: readonly string[],
  readTime: ProcessingTimeReader = readProcessingTime
): Promise<string[]> {
  const sorted = [...new Set(scenes)].sort();
  const keep: string[] = [];

  let i = 0;
  while (i < sorted.length) {
    const key = duplicateKey(sorted[i]);
    let j = i + 1;
    while (j < sorted.length && key !== null && duplicateKey(sorted[j]) === key) {
      j++;
    }
    const group = sorted.slice(i, j);

    if (group.length > 1) {
      let latest = group[0];
      let latestTime = await readTime(latest);
      for (const candidate of group.slice(1)) {
        const time = await readTime(candidate);
        if (time.getTime() > latestTime.getTime()) {
          latest = candidate;
          latestTime = time;
        }
      }
      keep.push(latest);
    } else {
      keep.push(group[0]);
    }
    i = j;
  }

  return keep;
}
