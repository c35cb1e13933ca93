/**
 * Low-level formatting utilities for explain command output.
 */

import { colorizeToken, colors } from '../utils/colors';
import type { DiscoveryResult, TraceStep, Zone } from '../../types';

/**
 * Box drawing characters for formatting
 */
export interface BoxChars {
  // Double-line box (header)
  dh: string; // horizontal
  dv: string; // vertical
  dtl: string; // top-left
  dtr: string; // top-right
  dbl: string; // bottom-left
  dbr: string; // bottom-right
  // Single-line box
  h: string;
  v: string;
  tl: string;
  tr: string;
  bl: string;
  br: string;
  // Segment separator
  sh: string; // heavy horizontal
}

export function getBoxChars(asciiOnly: boolean): BoxChars {
  if (asciiOnly) {
    return {
      dh: '=',
      dv: '|',
      dtl: '+',
      dtr: '+',
      dbl: '+',
      dbr: '+',
      h: '-',
      v: '|',
      tl: '+',
      tr: '+',
      bl: '+',
      br: '+',
      sh: '=',
    };
  }
  return {
    dh: '═',
    dv: '║',
    dtl: '╔',
    dtr: '╗',
    dbl: '╚',
    dbr: '╝',
    h: '─',
    v: '│',
    tl: '┌',
    tr: '┐',
    bl: '└',
    br: '┘',
    sh: '━',
  };
}

export function formatHeader(box: BoxChars, width: number): string[] {
  const title = '  Deletion Analysis';
  const padding = width - title.length;
  return [
    `${box.dtl}${box.dh.repeat(width)}${box.dtr}`,
    `${box.dv}${title}${' '.repeat(padding)}${box.dv}`,
    `${box.dbl}${box.dh.repeat(width)}${box.dbr}`,
  ];
}

/**
 * Format a token array with each token in a unique distinct color.
 * Uses a curated palette for maximum visual distinction.
 */
export function formatColoredTokenArray(tokens: readonly string[]): string {
  const coloredTokens = tokens.map((token, index) => colorizeToken(token, index));
  return `[${coloredTokens.join(',')}]`;
}

export function wrapReason(reason: string, indent: string, maxWidth = 70): string[] {
  const words = reason.split(' ');
  const lines: string[] = [];
  let current = '';

  for (const word of words) {
    if (current.length + word.length + 1 > maxWidth) {
      lines.push(current);
      current = word;
    } else {
      current = current ? `${current} ${word}` : word;
    }
  }
  if (current) lines.push(current);

  return lines.map((line, i) => (i === 0 ? line : `${indent}${line}`));
}

export interface FormattedStep {
  lines: string[];
  incrementStep: boolean;
}

const ZONE_LABELS: Record<Zone, (s: string) => string> = {
  workspace: colors.green,
  whitelist: colors.cyan,
  tmp: colors.dim,
  outside: colors.red,
};

function formatZone(zone: Zone): string {
  return ZONE_LABELS[zone](`[${zone}]`.padEnd(11));
}

function describeDiscovery(result: DiscoveryResult): string[] {
  switch (result.kind) {
    case 'found':
      return [`  Found:  ${result.paths.length} path(s)`, ...result.paths.map((p) => `    ${p}`)];
    case 'none':
      return ['  Result: nothing to delete'];
    case 'unavailable':
      return [`  Result: ${colors.yellow('unavailable')} (${result.reason})`];
  }
}

export function formatStep(step: TraceStep, stepNum: number, box: BoxChars): FormattedStep | null {
  const lines: string[] = [''];

  switch (step.type) {
    case 'detect':
      lines.push(`STEP ${stepNum} ${box.h} Detect deletion`);
      lines.push(step.kind ? `  Kind:   ${step.kind}` : '  Result: no deletion command');
      return { lines, incrementStep: true };

    case 'unresolvable':
      lines.push(`STEP ${stepNum} ${box.h} Check unresolvable constructs`);
      lines.push(step.construct ? `  Found:  ${colors.yellow(step.construct)}` : '  Result: none');
      return { lines, incrementStep: true };

    case 'extract':
      lines.push(`STEP ${stepNum} ${box.h} Extract targets`);
      if (step.segments.length === 0) {
        lines.push('  Result: no explicit targets');
      }
      for (const seg of step.segments) {
        lines.push(`  ${seg.verb}: ${seg.targets.length > 0 ? seg.targets.join(', ') : '(none)'}`);
        if (seg.unresolved.length > 0) {
          lines.push(`    unresolved: ${colors.yellow(seg.unresolved.join(', '))}`);
        }
      }
      return { lines, incrementStep: true };

    case 'discover':
      lines.push(`STEP ${stepNum} ${box.h} Dry run`);
      lines.push(...describeDiscovery(step.result));
      return { lines, incrementStep: true };

    case 'classify':
      lines.push(`STEP ${stepNum} ${box.h} Classify targets`);
      for (const target of step.targets) {
        const missing = target.exists ? '' : colors.dim(' (missing)');
        lines.push(`  ${formatZone(target.zone)} ${target.resolved}${missing}`);
      }
      return { lines, incrementStep: true };

    case 'prompt':
      lines.push(`STEP ${stepNum} ${box.h} Ask for confirmation (${step.kind})`);
      lines.push(`  ${box.tl}${box.h.repeat(3)}`);
      for (const line of step.message.trim().split('\n')) {
        lines.push(`  ${box.v} ${line}`);
      }
      lines.push(`  ${box.bl}${box.h.repeat(3)}`);
      return { lines, incrementStep: true };

    case 'backup':
      lines.push(`STEP ${stepNum} ${box.h} Back up`);
      lines.push(`  Root:  ${step.root}`);
      lines.push(`  Paths: ${step.paths.join(', ')}`);
      return { lines, incrementStep: true };

    default:
      return null;
  }
}
