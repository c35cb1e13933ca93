/**
 * Formatting functions for explain command output.
 */

import {
  formatColoredTokenArray,
  formatHeader,
  formatStep,
  getBoxChars,
  wrapReason,
} from './format-helpers';
import type { ExplainResult } from './analyze';
import { colors } from '../utils/colors';

const STATUS_LABELS = {
  allow: () => colors.green('ALLOWED'),
  'allow-with-backup': () => colors.green('ALLOWED (after backup)'),
  prompt: () => colors.yellow('NEEDS CONFIRMATION'),
} satisfies Record<ExplainResult['outcome'], () => string>;

export function formatTraceHuman(result: ExplainResult, options?: { asciiOnly?: boolean }): string {
  const box = getBoxChars(options?.asciiOnly ?? false);
  const width = 58;
  const lines: string[] = [];

  lines.push(...formatHeader(box, width));
  lines.push('');

  if (result.error) {
    lines.push('ERROR');
    lines.push(`  ${result.error}`);
  } else {
    lines.push('INPUT');
    lines.push(`  ${result.input}`);
    lines.push(`  cwd:       ${result.cwd}`);
    lines.push(`  workspace: ${result.workspace}`);
    lines.push('');

    let stepNum = 1;
    lines.push(`STEP ${stepNum} ${box.h} Split shell commands`);
    stepNum++;
    result.segments.forEach((seg, i) => {
      lines.push(`  Segment ${i + 1}: ${formatColoredTokenArray(seg)}`);
    });

    for (const step of result.steps) {
      const formatted = formatStep(step, stepNum, box);
      if (!formatted) continue;
      lines.push(...formatted.lines);
      if (formatted.incrementStep) {
        stepNum++;
      }
    }
  }

  lines.push('');
  lines.push('RESULT');
  lines.push(`  Status: ${STATUS_LABELS[result.outcome]()}`);
  if (result.reason) {
    const indent = '          ';
    const reasonLines = result.reason
      .split('\n')
      .flatMap((paragraph) => wrapReason(paragraph, indent));
    lines.push(`  Denied: ${reasonLines[0] ?? ''}`);
    for (let i = 1; i < reasonLines.length; i++) {
      const line = reasonLines[i] ?? '';
      lines.push(line.startsWith(indent) ? line : `${indent}${line}`);
    }
  }

  lines.push('');
  lines.push('CONFIG');
  if (result.configSources.length === 0) {
    lines.push('  Path: none');
  }
  for (const source of result.configSources) {
    const status = source.valid ? '' : colors.red(' (invalid, ignored)');
    lines.push(`  ${source.scope === 'user' ? 'User:   ' : 'Project:'} ${source.path}${status}`);
  }

  return lines.join('\n');
}

export function formatTraceJson(result: ExplainResult): string {
  return JSON.stringify(result, null, 2);
}
