/**
 * Logger
 *
 * Semantic logging for the two workloads:
 * - IMPORT: merging pathway maps and annotations into the graph
 * - ASK: answering a question against the graph
 *
 * Design principles:
 * - Action-oriented verbs (Parsed, Retrying, Answered)
 * - Clear visual hierarchy with minimal nesting
 * - Show what matters, hide implementation details
 */

import type { AgentAnswer, AttemptRecord, Category, ImportReport, SkippedRecord } from '@/core';
import { c } from './colors';

// ═══════════════════════════════════════════════════════════════════════════════
// Formatting Utilities
// ═══════════════════════════════════════════════════════════════════════════════

/** Format current time as [HH:MM:SS] */
export function formatTime(date: Date = new Date()): string {
  const hours = String(date.getHours()).padStart(2, '0');
  const minutes = String(date.getMinutes()).padStart(2, '0');
  const seconds = String(date.getSeconds()).padStart(2, '0');
  return `[${hours}:${minutes}:${seconds}]`;
}

/** Truncate text to max length with ellipsis */
export function truncate(text: string, maxLength: number): string {
  // Normalize whitespace (collapse newlines and multiple spaces)
  const normalized = text.replace(/\s+/g, ' ').trim();
  if (normalized.length <= maxLength) return normalized;
  return `${normalized.slice(0, maxLength - 3)}...`;
}

/** Indent string for continuation lines (matches timestamp width) */
const INDENT = '           '; // 11 chars to align with [HH:MM:SS] + space

// ═══════════════════════════════════════════════════════════════════════════════
// Graph Import Logging (IMPORT)
// ═══════════════════════════════════════════════════════════════════════════════

export function logImportStart(pathwayCount: number, annotationSource: string | null): void {
  const time = c.dim(formatTime());
  const annotations = annotationSource ? ` + ${annotationSource}` : '';
  console.log(`${time} ${c.cyan('IMPORT')} ${pathwayCount} pathway map(s)${annotations}`);
}

export function logPathwayParsed(name: string, genes: number, relations: number): void {
  console.log(
    `${INDENT}${c.brightGreen('✓ Parsed')} ${c.white(name)} ${c.dim(`(${genes} genes, ${relations} relations)`)}`
  );
}

export function logRecordSkipped(record: SkippedRecord): void {
  console.log(
    `${INDENT}${c.yellow('⊘ Skipped')} ${c.dim(`[${record.reason}]`)} ${record.source}: ${c.dim(truncate(record.detail, 60))}`
  );
}

export function logImportResult(report: ImportReport): void {
  console.log(
    `${INDENT}${c.dim('→')} ${report.genes} genes, ${report.diseases} diseases, ${report.annotations} annotations`
  );
  console.log(
    `${INDENT}${c.dim('→')} ${report.interactions} interactions, ${report.associations} associations, ${report.annotationLinks} annotation links`
  );

  const skipped = Object.entries(report.skipped)
    .filter(([, count]) => count > 0)
    .map(([reason, count]) => `${reason}=${count}`);
  if (skipped.length > 0 || report.unmatchedAnnotations > 0) {
    console.log(
      `${INDENT}${c.yellow('⊘')} ${c.dim(`skipped ${skipped.join(', ') || 'none'}, unmatched annotation rows ${report.unmatchedAnnotations}`)}`
    );
  }

  console.log(
    `${INDENT}${c.brightGreen('+ Created')} ${report.nodesCreated} nodes, ${report.relationshipsCreated} relationships ${c.dim(`(${report.durationMs}ms)`)}`
  );
}

// ═══════════════════════════════════════════════════════════════════════════════
// Question Answering Logging (ASK)
// ═══════════════════════════════════════════════════════════════════════════════

export function logAskStart(question: string): void {
  const time = c.dim(formatTime());
  const preview = truncate(question, 60);
  console.log(`${time} ${c.magenta('ASK')} "${c.white(preview)}"`);
}

export function logCategory(category: Category): void {
  console.log(`${INDENT}${c.dim('→ Category:')} ${category}`);
}

export function logAttempt(record: AttemptRecord): void {
  const query = truncate(record.query, 70);
  if (record.error) {
    console.log(`${INDENT}${c.brightRed(`✗ Attempt ${record.attempt}`)} ${c.dim(query)}`);
    console.log(`${INDENT}  ${c.dim(truncate(record.error.message, 80))}`);
    return;
  }
  console.log(`${INDENT}${c.brightGreen(`✓ Attempt ${record.attempt}`)} ${c.dim(query)}`);
}

export function logAskResult(result: AgentAnswer): void {
  switch (result.status) {
    case 'answered':
      console.log(`${INDENT}${c.brightGreen('= Answered')}: "${c.white(truncate(result.answer, 60))}"`);
      break;
    case 'not_found':
      console.log(`${INDENT}${c.yellow('= Not found')}`);
      break;
    case 'failed':
      console.log(
        `${INDENT}${c.brightRed('✗ Failed')} ${c.dim(`[${result.error.type}]`)} ${truncate(result.error.message, 60)}`
      );
      break;
  }
}
