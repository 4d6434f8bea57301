/**
 * Text formatter for human-readable output
 */
import chalk from 'chalk';
import type { Chalk } from 'chalk';
import type { SyncResult, VerifyResult } from '../types/index.js';
import { SkipReason } from '../types/index.js';

export interface TextFormatOptions {
  /** Defaults to chalk's terminal detection */
  color?: boolean;
}

function getChalk(options: TextFormatOptions): Chalk {
  if (options.color === undefined) return chalk;
  return new chalk.Instance({ level: options.color ? 1 : 0 });
}

/**
 * Human label for a skip reason
 */
export function describeSkipReason(reason: SkipReason): string {
  switch (reason) {
    case SkipReason.AlreadyRegistered:
      return 'already in project';
    case SkipReason.UnsupportedType:
      return 'not a compilable source';
    case SkipReason.DuplicateCandidate:
      return 'same name listed earlier';
    case SkipReason.SynchronizedFolder:
      return 'inside a synchronized folder';
  }
}

function banner(color: (text: string) => string, message: string): string[] {
  return [color('═'.repeat(60)), color(`  ${message}`), color('═'.repeat(60))];
}

/**
 * Format a sync result as text
 */
export function formatSyncText(result: SyncResult, options: TextFormatOptions = {}): string {
  const c = getChalk(options);
  const lines: string[] = [];

  lines.push(c.bold.underline('\n📦 xcsync Results\n'));
  lines.push(`📁 Project: ${result.pbxprojPath}`);
  if (result.targetName) {
    lines.push(`🎯 Target: ${result.targetName}`);
  }
  lines.push(`⏱️  Duration: ${result.duration}ms`);
  lines.push('');

  const count = result.added.length;
  if (count === 0) {
    lines.push(...banner(c.green.bold, '✅  UP TO DATE: nothing to add'));
  } else if (result.dryRun) {
    lines.push(...banner(c.yellow.bold, `📝  DRY RUN: ${count} file(s) would be added, nothing written`));
  } else {
    lines.push(...banner(c.green.bold, `✅  ADDED ${count} file(s)`));
  }
  lines.push('');

  if (count > 0) {
    lines.push(c.bold(result.dryRun ? 'Would add:' : 'Added:'));
    for (const file of result.added) {
      lines.push(`   ${c.green('+')} ${file.name} ${c.dim(`→ ${file.group || '(main group)'}`)}`);
    }
    lines.push('');
  }

  if (result.createdGroups.length > 0) {
    lines.push(c.bold('Groups created:'));
    for (const group of result.createdGroups) {
      lines.push(`   ${c.green('+')} ${group}`);
    }
    lines.push('');
  }

  if (result.skipped.length > 0) {
    lines.push(c.bold(`Skipped (${result.skipped.length}):`));
    for (const skip of result.skipped) {
      lines.push(c.dim(`   - ${skip.path}: ${describeSkipReason(skip.reason)}`));
    }
    lines.push('');
  }

  return lines.join('\n');
}

/**
 * Format a verify result as text
 */
export function formatVerifyText(result: VerifyResult, options: TextFormatOptions = {}): string {
  const c = getChalk(options);
  const lines: string[] = [];

  lines.push(c.bold.underline('\n🔍 xcsync Integrity Check\n'));
  lines.push(`📁 Project: ${result.pbxprojPath}`);
  lines.push(
    `📊 ${result.counts.fileReferences} file references, ${result.counts.buildFiles} build files, ` +
    `${result.counts.groups} groups, ${result.counts.buildPhases} sources phases`
  );
  lines.push('');

  if (result.issues.length === 0) {
    lines.push(...banner(c.green.bold, '✅  PASS: no integrity issues'));
    lines.push('');
    return lines.join('\n');
  }

  lines.push(...banner(c.red.bold, `❌  ${result.issues.length} integrity issue(s) found`));
  lines.push('');
  result.issues.forEach((issue, index) => {
    lines.push(`${c.bold(`${index + 1}.`)} ${c.red(`[${issue.kind}]`)} ${issue.message}`);
  });
  lines.push('');

  return lines.join('\n');
}
