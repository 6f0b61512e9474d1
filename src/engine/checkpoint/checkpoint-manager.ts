/**
 * Checkpoint Manager - durable snapshots of the catalog with backup rotation
 *
 * Every checkpoint goes to a fresh timestamped backup beside the output file.
 * A progress checkpoint replaces the previous progress backup of the run, so
 * at most one is kept. Final checkpoints then replace the output file by
 * copy + rename, so the output path never holds a partially written catalog,
 * and older backups are pruned.
 */

import path from 'path';
import fs from 'fs';

import type { Catalog } from '../types/catalog.js';
import type { CatalogIO } from '../interfaces/catalog-io.js';
import { cloneCatalog } from '../types/catalog.js';
import { CheckpointIOError, errorMessage } from '../errors.js';

export const DEFAULT_FINAL_SAVE_TIMEOUT_MS = 30_000;

export type CheckpointReport =
  | { status: 'saved'; isFinal: boolean; outputPath: string; backupPath: string }
  | { status: 'direct'; isFinal: boolean; outputPath: string; error: string }
  | { status: 'lost'; isFinal: boolean; outputPath: string; error: CheckpointIOError };

export type FinalizeOutcome =
  | { timedOut: false; report: CheckpointReport }
  | { timedOut: true; pending: Promise<CheckpointReport> };

export interface CheckpointManagerOptions {
  io: CatalogIO;
  outputPath: string;
  now?: () => Date;
}

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

/** YYYYMMDD_HHMMSS_mmm in local time */
export function formatTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}` +
    `_${pad(date.getMilliseconds(), 3)}`
  );
}

export class CheckpointManager {
  readonly outputPath: string;
  private readonly io: CatalogIO;
  private readonly now: () => Date;
  private readonly backupPrefix: string;
  private readonly extension: string;
  private lastStamp = '';
  private sameStampCount = 0;
  private progressBackup: string | null = null;
  private chain: Promise<unknown> = Promise.resolve();
  private counts = { saved: 0, direct: 0, lost: 0 };

  constructor(options: CheckpointManagerOptions) {
    this.io = options.io;
    this.outputPath = options.outputPath;
    this.now = options.now ?? (() => new Date());

    this.extension = path.extname(options.outputPath);
    const base = path.basename(options.outputPath, this.extension);
    this.backupPrefix = `${base}_backup_`;
  }

  /**
   * Snapshot the catalog now and write it. Calls are serialized; the
   * returned report says where the snapshot ended up, or that it was lost.
   */
  checkpoint(catalog: Catalog, isFinal = false): Promise<CheckpointReport> {
    const snapshot = cloneCatalog(catalog);
    const next = this.chain.then(() => this.write(snapshot, isFinal));
    this.chain = next.catch(() => undefined);
    return next;
  }

  /**
   * Final checkpoint bounded by a timeout. On timeout the save keeps running
   * and the caller gets its promise back.
   */
  async finalize(catalog: Catalog, timeoutMs = DEFAULT_FINAL_SAVE_TIMEOUT_MS): Promise<FinalizeOutcome> {
    const pending = this.checkpoint(catalog, true);

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<'timeout'>(resolve => {
      timer = setTimeout(() => resolve('timeout'), timeoutMs);
    });

    try {
      const winner = await Promise.race([pending, timeout]);
      if (winner === 'timeout') {
        console.warn(`[Checkpoint] Final save still running after ${timeoutMs}ms; continuing in the background`);
        return { timedOut: true, pending };
      }
      return { timedOut: false, report: winner };
    } finally {
      clearTimeout(timer);
    }
  }

  getCounts(): { saved: number; direct: number; lost: number } {
    return { ...this.counts };
  }

  nextBackupPath(): string {
    const stamp = formatTimestamp(this.now());
    if (stamp === this.lastStamp) {
      this.sameStampCount++;
    } else {
      this.lastStamp = stamp;
      this.sameStampCount = 0;
    }
    const suffix = this.sameStampCount > 0 ? `_${this.sameStampCount}` : '';
    return path.join(
      path.dirname(this.outputPath),
      `${this.backupPrefix}${stamp}${suffix}${this.extension}`
    );
  }

  private async write(snapshot: Catalog, isFinal: boolean): Promise<CheckpointReport> {
    const backupPath = this.nextBackupPath();

    try {
      await this.io.save(snapshot, backupPath);
    } catch (error) {
      console.error(`[Checkpoint] Error saving backup ${backupPath}: ${errorMessage(error)}`);
      return this.writeDirect(snapshot, isFinal, error);
    }

    if (isFinal) {
      try {
        await this.promote(backupPath);
      } catch (error) {
        console.error(`[Checkpoint] Error promoting ${backupPath}: ${errorMessage(error)}`);
        return this.writeDirect(snapshot, isFinal, error);
      }
      console.log(`[Checkpoint] Final translation saved to: ${this.outputPath}`);
      await this.pruneBackups(backupPath);
      this.progressBackup = null;
    } else {
      console.log(`[Checkpoint] Progress saved to: ${backupPath}`);
      if (this.progressBackup) {
        await this.removeBackup(path.basename(this.progressBackup));
      }
      this.progressBackup = backupPath;
    }

    this.counts.saved++;
    return { status: 'saved', isFinal, outputPath: this.outputPath, backupPath };
  }

  /**
   * Fallback when the backup path cannot be used
   */
  private async writeDirect(snapshot: Catalog, isFinal: boolean, cause: unknown): Promise<CheckpointReport> {
    try {
      await this.io.save(snapshot, this.outputPath);
      console.log(`[Checkpoint] Saved directly to: ${this.outputPath}`);
      this.counts.direct++;
      return { status: 'direct', isFinal, outputPath: this.outputPath, error: errorMessage(cause) };
    } catch (error) {
      const lost = new CheckpointIOError(
        this.outputPath,
        `Failed to save progress: ${errorMessage(error)} (backup: ${errorMessage(cause)})`,
        { cause: error }
      );
      console.error(`[Checkpoint] ${lost.message}`);
      this.counts.lost++;
      return { status: 'lost', isFinal, outputPath: this.outputPath, error: lost };
    }
  }

  /**
   * Copy the backup next to the output and rename it into place
   */
  private async promote(backupPath: string): Promise<void> {
    const tempPath = path.join(
      path.dirname(this.outputPath),
      `.${path.basename(this.outputPath)}.${process.pid}.tmp`
    );
    try {
      await fs.promises.copyFile(backupPath, tempPath);
      await fs.promises.rename(tempPath, this.outputPath);
    } catch (error) {
      await fs.promises.rm(tempPath, { force: true });
      throw error;
    }
  }

  /**
   * Remove every backup of this output except `keep`
   */
  private async pruneBackups(keep: string): Promise<void> {
    const dir = path.dirname(this.outputPath);
    let names: string[];
    try {
      names = await fs.promises.readdir(dir);
    } catch (error) {
      console.warn(`[Checkpoint] Could not list backups in ${dir}: ${errorMessage(error)}`);
      return;
    }

    const keepName = path.basename(keep);
    const stale = names.filter(
      name => name.startsWith(this.backupPrefix) && name.endsWith(this.extension) && name !== keepName
    );

    for (const name of stale) {
      await this.removeBackup(name);
    }
  }

  private async removeBackup(name: string): Promise<void> {
    try {
      await fs.promises.unlink(path.join(path.dirname(this.outputPath), name));
    } catch (error) {
      console.warn(`[Checkpoint] Could not remove old backup ${name}: ${errorMessage(error)}`);
    }
  }
}
