import { mkdir, rename, rm, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { Observation, OrderedBatch } from '@/models';
import { WriteFailureError } from '@/errors';
import { ILogger } from '@/interfaces/ILogger';
import { IStoreWriter, WriteResult } from './interfaces';
import { renderCsv } from '@/utils/csv';
import { formatRow, partitionPath } from './leanCsv.format';

/**
 * Local partitioned store under a data folder
 *
 * Every partition a batch touches is rewritten in full. The file is
 * written next to its target and renamed over it, so readers see either
 * the old or the new content.
 */
export class LeanDiskWriter implements IStoreWriter {
  constructor(
    private readonly dataFolder: string,
    private readonly logger: ILogger
  ) {}

  async write(batch: OrderedBatch): Promise<WriteResult> {
    const partitions = this.partition(batch);
    const written: string[] = [];

    for (const [relative, observations] of partitions) {
      const target = path.join(this.dataFolder, relative);
      const rows = observations.map((observation) =>
        formatRow(observation, batch.instrument.securityType, batch.resolution)
      );

      try {
        await this.writeAtomically(target, await renderCsv(rows));
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        throw new WriteFailureError(`Could not write ${target}: ${message}`, error);
      }

      this.logger.debug({ file: target, rows: rows.length }, 'Partition written');
      written.push(target);
    }

    return { partitions: written, observationCount: batch.observations.length };
  }

  /**
   * Group the batch by partition file, keeping batch order inside each group
   */
  private partition(batch: OrderedBatch): Map<string, Observation[]> {
    const groups = new Map<string, Observation[]>();

    for (const observation of batch.observations) {
      const key = partitionPath(batch.instrument, batch.resolution, batch.tickType, observation.time);
      const group = groups.get(key);
      if (group) {
        group.push(observation);
      } else {
        groups.set(key, [observation]);
      }
    }

    return groups;
  }

  private async writeAtomically(target: string, contents: string): Promise<void> {
    const tmpPath = `${target}.${process.pid}.tmp`;
    await mkdir(path.dirname(target), { recursive: true });

    try {
      await writeFile(tmpPath, contents, 'utf8');
      await rename(tmpPath, target);
    } catch (error) {
      await rm(tmpPath, { force: true });
      throw error;
    }
  }
}
