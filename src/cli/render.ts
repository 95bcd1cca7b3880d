/**
 * @fileoverview Terminal rendering for CLI commands
 */

import type { PlanStageView, SelectedRule } from '../orchestrator/orchestration_facade.js';
import type { TaskClassification } from '../types.js';

export type FieldValue = string | number | boolean | null;

/** `[label, value]` pairs; a null value renders as `-`. */
export type Fields = ReadonlyArray<readonly [string, FieldValue]>;

export function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}

export function printFields(fields: Fields): void {
  const width = fields.reduce((max, [label]) => Math.max(max, label.length), 0);
  for (const [label, value] of fields) {
    console.log(`  ${`${label}:`.padEnd(width + 1)} ${value === null ? '-' : String(value)}`);
  }
}

/** Left-aligned columns separated by two spaces, with a dashed rule under the header. */
export function printColumns(header: readonly string[], rows: readonly (readonly string[])[]): void {
  const widths = header.map((title, column) =>
    rows.reduce((max, row) => Math.max(max, (row[column] ?? '').length), title.length),
  );
  const line = (cells: readonly string[]): string =>
    widths.map((width, column) => (cells[column] ?? '').padEnd(width)).join('  ').trimEnd();

  console.log(line(header));
  console.log(line(widths.map((width) => '-'.repeat(width))));
  rows.forEach((row) => console.log(line(row)));
}

export function formatElapsed(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  const seconds = ms / 1000;
  if (seconds < 60) return `${seconds.toFixed(1)}s`;
  return `${Math.floor(seconds / 60)}m ${Math.round(seconds % 60)}s`;
}

/** `YYYY-MM-DD HH:MM:SS UTC`, or `never` when no time is recorded. */
export function formatInstant(iso: string | null): string {
  if (!iso) return 'never';
  return `${new Date(iso).toISOString().slice(0, 19).replace('T', ' ')} UTC`;
}

export function printClassification(classification: TaskClassification, mode: string): void {
  console.log('Classification:');
  printFields([
    ['Project Type', classification.projectType],
    ['Complexity', classification.complexity],
    ['Risk Flags', classification.riskFlags.join(', ') || null],
    ['Confidence', classification.confidence.toFixed(2)],
    ['Mode', mode],
  ]);
}

export function printRules(rules: readonly SelectedRule[], rationale: string, verbose: boolean): void {
  console.log('Rules:');
  rules.forEach((rule, index) => {
    const marker = rule.mandatory ? ' (mandatory)' : '';
    const score = verbose ? ` score=${rule.score.toFixed(2)}` : '';
    console.log(`  ${index + 1}. ${rule.id} [${rule.category}]${marker}${score} - ${rule.title}`);
  });
  console.log(`\n${rationale}`);
}

export function printStages(template: string, stages: readonly PlanStageView[]): void {
  console.log(`Plan (${template}):`);
  stages.forEach((stage, index) => {
    console.log(`  ${index + 1}. ${stage.name} - ${stage.description}`);
    console.log(`     rules: ${stage.rules.join(', ') || '-'}`);
    console.log(`     gates: ${stage.qualityGates.join(', ') || '-'}`);
  });
}
