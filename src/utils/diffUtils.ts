/**
 * Diff utilities for creating git-style unified diffs
 */

import { structuredPatch } from 'diff';
import { TURN_DIFF } from '../config/constants.js';

const NO_NEWLINE_MARKER = '\\ No newline at end of file';

export interface FileDiffInput {
  /** Path before the change, relative to the diff root */
  oldPath: string;
  /** Path after the change, relative to the diff root */
  newPath: string;
  /** null when the file did not exist before */
  oldContent: string | null;
  /** null when the file no longer exists */
  newContent: string | null;
  contextLines: number;
}

/**
 * Create a git-style diff for one file
 *
 * Adds, deletes and renames get the matching extended header lines; the
 * absent side of an add or delete is /dev/null. Hunks come from the `diff`
 * package.
 *
 * @returns Diff text ending in a newline, or '' when nothing changed
 */
export function createGitFileDiff(input: FileDiffInput): string {
  const { oldPath, newPath, oldContent, newContent, contextLines } = input;
  const renamed = oldPath !== newPath;

  if (oldContent === newContent && !renamed) {
    return '';
  }

  const lines = [`diff --git a/${oldPath} b/${newPath}`];
  if (oldContent === null) {
    lines.push(`new file mode ${TURN_DIFF.DEFAULT_FILE_MODE}`);
  } else if (newContent === null) {
    lines.push(`deleted file mode ${TURN_DIFF.DEFAULT_FILE_MODE}`);
  }
  if (renamed) {
    lines.push(`rename from ${oldPath}`, `rename to ${newPath}`);
  }

  if (oldContent !== newContent) {
    const patch = structuredPatch(
      `a/${oldPath}`,
      `b/${newPath}`,
      oldContent ?? '',
      newContent ?? '',
      undefined,
      undefined,
      { context: contextLines }
    );

    lines.push(`--- ${oldContent === null ? TURN_DIFF.DEV_NULL : `a/${oldPath}`}`);
    lines.push(`+++ ${newContent === null ? TURN_DIFF.DEV_NULL : `b/${newPath}`}`);

    // A deleted file has no new side for the marker to describe
    const dropEofMarker = newContent === null && (oldContent ?? '').endsWith('\n');

    for (const hunk of patch.hunks) {
      // Empty ranges point at the line before the change
      const oldStart = hunk.oldLines === 0 ? hunk.oldStart - 1 : hunk.oldStart;
      const newStart = hunk.newLines === 0 ? hunk.newStart - 1 : hunk.newStart;
      lines.push(`@@ -${oldStart},${hunk.oldLines} +${newStart},${hunk.newLines} @@`);
      lines.push(...(dropEofMarker ? hunk.lines.filter(line => line !== NO_NEWLINE_MARKER) : hunk.lines));
    }
  }

  return lines.join('\n') + '\n';
}

/**
 * Diff statistics
 */
export interface DiffStats {
  additions: number;
  deletions: number;
  changes: number;
}

/**
 * Calculate diff statistics from a unified diff string
 *
 * Counts added and removed lines, excluding the +++/--- headers.
 */
export function calculateDiffStats(diffContent: string): DiffStats {
  const lines = diffContent.split('\n');
  let additions = 0;
  let deletions = 0;

  for (const line of lines) {
    if (line.startsWith('+') && !line.startsWith('+++')) {
      additions++;
    } else if (line.startsWith('-') && !line.startsWith('---')) {
      deletions++;
    }
  }

  return {
    additions,
    deletions,
    changes: additions + deletions,
  };
}
