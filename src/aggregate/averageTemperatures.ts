import type { TemperatureBlock } from '../log/types.js';

export type AverageMap = ReadonlyMap<number, number>;

/**
 * Mean temperature per channel over the blocks that report it.
 *
 * A channel missing from a block does not count toward that channel's mean,
 * and a channel missing from every block has no entry at all.
 */
export function averageTemperatures(blocks: readonly TemperatureBlock[]): AverageMap {
  const sums = new Map<number, { total: number; count: number }>();
  for (const block of blocks) {
    for (const [channel, temperature] of block.readings) {
      const acc = sums.get(channel);
      if (acc) {
        acc.total += temperature;
        acc.count += 1;
      } else {
        sums.set(channel, { total: temperature, count: 1 });
      }
    }
  }

  const averages = new Map<number, number>();
  for (const [channel, { total, count }] of sums) {
    averages.set(channel, total / count);
  }
  return averages;
}
