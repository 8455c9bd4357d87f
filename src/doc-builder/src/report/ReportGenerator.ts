/**
 * ReportGenerator - Summaries of a batch run.
 *
 * Markdown for people (summary table, then one section per file with
 * its element table and warnings) and JSON for tooling. Reports read
 * the results; they take no part in the pipeline.
 */

import * as path from 'path';
import { BatchResult, FileResult, InjectionEdit } from '../types';

export type ReportFormat = 'md' | 'json';

export interface ReportConfig {
  title: string;
  /** Paths are shown relative to this directory when set */
  relativeTo?: string;
  includeWarnings: boolean;
  /** Leave out files that needed no change */
  onlyChanged: boolean;
}

const DEFAULT_CONFIG: ReportConfig = {
  title: 'Docstring Report',
  includeWarnings: true,
  onlyChanged: false,
};

export function isReportFormat(value: string): value is ReportFormat {
  return value === 'md' || value === 'json';
}

function escapeCell(value: string): string {
  return value.replace(/\|/g, '\\|').replace(/\r?\n/g, ' ');
}

export class ReportGenerator {
  private config: ReportConfig;

  constructor(
    private readonly batch: BatchResult,
    config: Partial<ReportConfig> = {}
  ) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  generate(format: ReportFormat): string {
    return format === 'json' ? this.generateJSON() : this.generateMarkdown();
  }

  generateMarkdown(): string {
    const sections: string[] = [];

    sections.push(`# ${this.config.title}`);
    sections.push('');
    sections.push(`> Run ${this.batch.runId} started ${this.batch.startedAt} (style: ${this.batch.style})`);
    sections.push('');
    sections.push(this.generateSummary());

    const files = this.config.onlyChanged
      ? this.batch.files.filter((f) => f.status !== 'unchanged')
      : this.batch.files;

    if (files.length > 0) {
      sections.push('## Files');
      sections.push('');
      for (const file of files) {
        sections.push(this.generateFileSection(file));
      }
    }

    return sections.join('\n');
  }

  /**
   * Run data without refinement history.
   */
  generateJSON(): string {
    const data = {
      runId: this.batch.runId,
      startedAt: this.batch.startedAt,
      style: this.batch.style,
      statistics: this.batch.statistics,
      files: this.batch.files.map((file) => ({
        path: this.displayPath(file.path),
        status: file.status,
        fingerprint: file.fingerprint,
        durationMs: file.durationMs,
        error: file.error,
        skipped: file.skipped,
        elements: file.results.map((r) => ({
          name: r.qualifiedName,
          confidence: r.confidenceScore,
          iterations: r.iterationsUsed,
          outcome: r.outcome,
          warnings: r.warnings,
        })),
      })),
    };
    return JSON.stringify(data, null, 2);
  }

  private generateSummary(): string {
    const stats = this.batch.statistics;
    const lines: string[] = [];

    lines.push('## Summary');
    lines.push('');
    lines.push('| Metric | Value |');
    lines.push('|--------|-------|');
    lines.push(`| Files | ${stats.files_total} |`);
    lines.push(`| Rewritten | ${stats.files_processed} |`);
    lines.push(`| Unchanged | ${stats.files_unchanged} |`);
    lines.push(`| From Cache | ${stats.files_cached} |`);
    lines.push(`| Failed | ${stats.files_failed} |`);
    lines.push(`| Elements Documented | ${stats.elements_documented} |`);
    lines.push(`| Elements Skipped | ${stats.elements_skipped} |`);
    lines.push(`| Below Threshold | ${stats.elements_exhausted} |`);
    lines.push(`| Average Confidence | ${stats.average_confidence.toFixed(2)} |`);
    lines.push(`| Duration | ${stats.duration_ms}ms |`);
    lines.push('');
    return lines.join('\n');
  }

  private generateFileSection(file: FileResult): string {
    const lines: string[] = [];
    lines.push(`### ${this.displayPath(file.path)} (${file.status})`);
    lines.push('');

    if (file.error) {
      const where = file.error.line !== undefined ? ` at line ${file.error.line}` : '';
      lines.push(`**${file.error.name}**${where}: ${file.error.message}`);
      lines.push('');
      return lines.join('\n');
    }

    if (file.results.length > 0) {
      lines.push('| Element | Confidence | Iterations | Outcome |');
      lines.push('|---------|------------|------------|---------|');
      for (const result of file.results) {
        lines.push(
          `| ${escapeCell(result.qualifiedName)} | ${result.confidenceScore.toFixed(2)} | ${result.iterationsUsed} | ${result.outcome} |`
        );
      }
      lines.push('');
    }

    if (file.skipped.length > 0) {
      lines.push(`Skipped (existing docstring): ${file.skipped.map((s) => `\`${s.qualifiedName}\``).join(', ')}`);
      lines.push('');
    }

    if (this.config.includeWarnings) {
      const warnings = file.results.flatMap((r) => r.warnings.map((w) => `- \`${r.qualifiedName}\`: ${w}`));
      if (warnings.length > 0) {
        lines.push('Warnings:');
        lines.push('');
        lines.push(...warnings);
        lines.push('');
      }
    }

    return lines.join('\n');
  }

  private displayPath(filePath: string): string {
    return this.config.relativeTo ? path.relative(this.config.relativeTo, filePath) : filePath;
  }
}

/**
 * Compact listing of the edits made to one file, for `--diff`.
 */
export function formatEdits(filePath: string, edits: readonly InjectionEdit[]): string {
  const lines = [`--- ${filePath}`, `+++ ${filePath}`];
  // Edits are applied bottom-up; list them top-down
  const ordered = [...edits].sort((a, b) => a.line - b.line);
  for (const edit of ordered) {
    lines.push(`@@ line ${edit.line}: ${edit.action} docstring for ${edit.qualifiedName} @@`);
    for (const line of edit.text.split('\n')) {
      lines.push(`+${line}`);
    }
  }
  return lines.join('\n');
}
