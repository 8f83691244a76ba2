/**
 * TurnDiffTracker - Accumulates file changes made by patches during a turn
 *
 * The tracker snapshots each file the first time a patch touches it and,
 * when asked, diffs those baselines against what is on disk now. Every patch
 * call of a turn shares one tracker, so access goes through
 * SharedTurnDiffTracker, which serializes callers behind a mutex.
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import type { Config, FileChanges } from '../types/index.js';
import { createGitFileDiff, calculateDiffStats } from '../utils/diffUtils.js';
import { isFileNotFoundError } from '../utils/errorUtils.js';
import { generateId } from '../utils/id.js';
import { Mutex } from '../utils/Mutex.js';
import { logger } from './Logger.js';

export interface TurnDiffTracker {
  /** Record the files a patch is about to change */
  onPatchBegin(changes: FileChanges): void | Promise<void>;
  /**
   * Unified diff of everything changed so far in the turn
   *
   * @returns The diff, or null when nothing changed
   */
  getUnifiedDiff(): Promise<string | null>;
}

/**
 * A tracker shared by concurrent tool calls
 *
 * The lock is held for exactly one tracker call.
 */
export class SharedTurnDiffTracker {
  private readonly tracker: TurnDiffTracker;
  private readonly mutex = new Mutex();

  constructor(tracker: TurnDiffTracker) {
    this.tracker = tracker;
  }

  async withLock<T>(fn: (tracker: TurnDiffTracker) => T | Promise<T>): Promise<T> {
    return this.mutex.withLock(() => fn(this.tracker));
  }

  isLocked(): boolean {
    return this.mutex.isLocked();
  }
}

interface Baseline {
  /** Where the file lived when first seen */
  originalPath: string;
  /** Content when first seen; null if it did not exist */
  content: string | null;
}

async function readIfExists(filePath: string): Promise<string | null> {
  try {
    return await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if (isFileNotFoundError(error)) {
      return null;
    }
    throw error;
  }
}

/**
 * Tracker backed by the files on disk
 */
export class FileSystemTurnDiffTracker implements TurnDiffTracker {
  private readonly rootDir: string;
  private readonly contextLines: number;
  private baselines = new Map<string, Baseline>();
  private idByCurrentPath = new Map<string, string>();
  private currentPathById = new Map<string, string>();
  /** Files renamed onto a path that already had its own baseline */
  private removedIds = new Set<string>();

  constructor(rootDir: string, contextLines: number = 3) {
    this.rootDir = path.resolve(rootDir);
    this.contextLines = contextLines;
  }

  static fromConfig(rootDir: string, config: Pick<Config, 'diff_context_lines'>): FileSystemTurnDiffTracker {
    return new FileSystemTurnDiffTracker(rootDir, config.diff_context_lines);
  }

  async onPatchBegin(changes: FileChanges): Promise<void> {
    for (const [filePath, change] of Object.entries(changes)) {
      const absPath = path.resolve(this.rootDir, filePath);

      let id = this.idByCurrentPath.get(absPath);
      if (id === undefined) {
        id = generateId();
        this.baselines.set(id, { originalPath: absPath, content: await readIfExists(absPath) });
        this.idByCurrentPath.set(absPath, id);
        this.currentPathById.set(id, absPath);
      }

      if (change.type === 'update' && change.move_path !== undefined) {
        const destination = path.resolve(this.rootDir, change.move_path);
        this.idByCurrentPath.delete(absPath);

        const occupant = this.idByCurrentPath.get(destination);
        if (occupant !== undefined && occupant !== id) {
          // The destination keeps its own baseline; the moved file reads as deleted
          this.currentPathById.delete(id);
          this.removedIds.add(id);
          continue;
        }

        this.idByCurrentPath.set(destination, id);
        this.currentPathById.set(id, destination);
      }
    }
  }

  async getUnifiedDiff(): Promise<string | null> {
    const fileDiffs: Array<{ sortKey: string; text: string }> = [];

    for (const [id, baseline] of this.baselines) {
      const removed = this.removedIds.has(id);
      const currentPath = removed ? baseline.originalPath : this.currentPathById.get(id) ?? baseline.originalPath;
      const currentContent = removed ? null : await readIfExists(currentPath);
      const newPath = this.toRelative(currentPath);

      const text = createGitFileDiff({
        oldPath: this.toRelative(baseline.originalPath),
        newPath,
        oldContent: baseline.content,
        newContent: currentContent,
        contextLines: this.contextLines,
      });
      if (text !== '') {
        fileDiffs.push({ sortKey: newPath, text });
      }
    }

    if (fileDiffs.length === 0) {
      return null;
    }

    fileDiffs.sort((a, b) => (a.sortKey < b.sortKey ? -1 : a.sortKey > b.sortKey ? 1 : 0));
    const unifiedDiff = fileDiffs.map(diff => diff.text).join('');
    const stats = calculateDiffStats(unifiedDiff);
    logger.debug(
      `[TURN_DIFF] ${fileDiffs.length} file(s) changed, +${stats.additions} -${stats.deletions}`
    );
    return unifiedDiff;
  }

  getTrackedFileCount(): number {
    return this.baselines.size;
  }

  private toRelative(absPath: string): string {
    return path.relative(this.rootDir, absPath).split(path.sep).join('/');
  }
}
