/**
 * DocPipeline - Per-file and batch driver.
 *
 * Per file: extract -> infer -> refine every element -> inject.
 * Batch: files go through a bounded pool with a per-file deadline. A file
 * that fails or times out is reported and never written; its siblings
 * are unaffected. Results come back sorted by path, so pool size and
 * completion order never change the outcome.
 */

import { createHash } from 'crypto';
import * as fs from 'fs/promises';
import * as path from 'path';
import { v4 as uuidv4 } from 'uuid';
import {
  BatchResult,
  BatchStatistics,
  CodeElement,
  FileResult,
  PipelineConfig,
  SkippedElement,
} from '../types';
import { ElementExtractor } from '../core/ElementExtractor';
import { FileProcessingError, ParseError, errorMessage } from '../core/errors';
import { augmentElements } from '../analysis';
import { Capabilities, createCapabilities } from '../ai';
import { DocstringGenerator } from '../generation/DocstringGenerator';
import { DocstringCritic } from '../generation/DocstringCritic';
import { ConfidenceScorer } from '../generation/ConfidenceScorer';
import { getTemplate } from '../generation/StyleTemplates';
import { DocstringInjector } from '../injection/DocstringInjector';
import { ResultCache } from '../cache/ResultCache';
import { mapInChunks, withDeadline } from '../utils/concurrency';
import { RefinementOrchestrator } from './RefinementOrchestrator';

export interface ProcessFilesOptions {
  /** Write rewritten text back to each file */
  write?: boolean;
  /** Reuse cached results for files whose fingerprint is known */
  resume?: boolean;
  cache?: ResultCache;
  signal?: AbortSignal;
  /** Called as each file finishes, in completion order */
  onFile?: (result: FileResult) => void;
}

export class DocPipeline {
  private extractor: ElementExtractor;
  private orchestrator: RefinementOrchestrator;
  private injector: DocstringInjector;
  private signature: string;

  constructor(
    private readonly config: PipelineConfig,
    capabilities: Capabilities = createCapabilities(config)
  ) {
    this.extractor = new ElementExtractor();
    this.orchestrator = new RefinementOrchestrator(
      new DocstringGenerator(capabilities.generator),
      new DocstringCritic(capabilities.evaluator),
      new ConfidenceScorer(),
      {
        style: config.style,
        threshold: config.threshold,
        maxIterations: config.maxIterations,
        elementConcurrency: config.elementConcurrency,
      }
    );
    this.injector = new DocstringInjector({ overwrite: config.overwrite });
    this.signature = configSignature(config);
  }

  /**
   * Content fingerprint: file text plus every setting that affects output.
   */
  fingerprint(source: string): string {
    return createHash('sha256').update(source).update('\0').update(this.signature).digest('hex');
  }

  /**
   * Elements of a file, with inferred types and complexity.
   * Throws ParseError on invalid source.
   */
  analyze(source: string): CodeElement[] {
    return augmentElements(this.extractor.extract(source));
  }

  /**
   * Run one file's text through the whole pipeline. Never throws; a
   * failure comes back as a `failed` result without output.
   */
  async processSource(source: string, filePath: string, signal?: AbortSignal): Promise<FileResult> {
    const startTime = Date.now();
    const fingerprint = this.fingerprint(source);

    try {
      signal?.throwIfAborted();
      const elements = this.analyze(source);

      const untouched = new Set(this.injector.protectedElements(elements));
      const skipped: SkippedElement[] = elements
        .filter((e) => untouched.has(e))
        .map((e) => ({ qualifiedName: e.qualifiedName, reason: 'existing-doc' }));

      const results = await this.orchestrator.refineAll(
        elements.filter((e) => !untouched.has(e)),
        signal
      );

      // Injection only starts once every element is terminal
      signal?.throwIfAborted();
      const { text, edits } = this.injector.inject(source, elements, results);

      return {
        path: filePath,
        status: text === source ? 'unchanged' : 'processed',
        output: text,
        results,
        skipped,
        edits,
        fingerprint,
        durationMs: Date.now() - startTime,
      };
    } catch (error) {
      return failedResult(filePath, fingerprint, error, startTime);
    }
  }

  /**
   * Read, process and optionally rewrite one file.
   */
  async processFile(filePath: string, options: ProcessFilesOptions = {}): Promise<FileResult> {
    const startTime = Date.now();

    let source: string;
    try {
      source = await fs.readFile(filePath, 'utf-8');
    } catch (error) {
      const failure = new FileProcessingError(`cannot read file: ${errorMessage(error)}`, filePath, error);
      return failedResult(filePath, '', failure, startTime);
    }

    const fingerprint = this.fingerprint(source);
    const cached = options.resume ? options.cache?.get(fingerprint) : undefined;

    let result: FileResult;
    if (cached) {
      result = {
        path: filePath,
        status: 'cached',
        output: cached.output,
        results: cached.results,
        skipped: cached.skipped,
        edits: cached.edits,
        fingerprint,
        durationMs: Date.now() - startTime,
      };
    } else {
      try {
        result = await withDeadline(
          this.config.fileTimeoutMs,
          (signal) => this.processSource(source, filePath, signal),
          options.signal
        );
      } catch (error) {
        const failure = new FileProcessingError(`processing cancelled: ${errorMessage(error)}`, filePath, error);
        return failedResult(filePath, fingerprint, failure, startTime);
      }
    }

    if (result.status === 'failed' || result.output === undefined) {
      return result;
    }

    if (options.write && result.output !== source) {
      try {
        await fs.writeFile(filePath, result.output, 'utf-8');
      } catch (error) {
        const failure = new FileProcessingError(`cannot write file: ${errorMessage(error)}`, filePath, error);
        return failedResult(filePath, fingerprint, failure, startTime);
      }
    }

    if (options.cache && result.status !== 'cached') {
      options.cache.set(fingerprint, {
        path: filePath,
        output: result.output,
        results: result.results,
        skipped: result.skipped,
        edits: result.edits,
      });
    }

    return result;
  }

  /**
   * Process a batch of files through the bounded pool.
   */
  async processFiles(paths: readonly string[], options: ProcessFilesOptions = {}): Promise<BatchResult> {
    const startTime = Date.now();
    const startedAt = new Date(startTime).toISOString();
    const unique = [...new Set(paths.map((p) => path.resolve(p)))].sort();

    const files = await mapInChunks(unique, this.config.concurrency, async (filePath) => {
      const result = await this.processFile(filePath, options);
      options.onFile?.(result);
      return result;
    });

    options.cache?.save();

    files.sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
    return {
      runId: uuidv4(),
      startedAt,
      style: this.config.style,
      files,
      statistics: summarize(files, Date.now() - startTime),
    };
  }
}

/**
 * Stable text of the settings that change a file's output.
 */
export function configSignature(config: PipelineConfig): string {
  return JSON.stringify({
    style: config.style,
    template: getTemplate(config.style).version,
    threshold: config.threshold,
    maxIterations: config.maxIterations,
    overwrite: config.overwrite,
    provider: config.provider,
    model: config.provider === 'none' ? null : (config.model ?? null),
  });
}

export function summarize(files: readonly FileResult[], durationMs: number): BatchStatistics {
  const results = files.flatMap((f) => f.results);
  const totalConfidence = results.reduce((sum, r) => sum + r.confidenceScore, 0);

  return {
    files_total: files.length,
    files_processed: files.filter((f) => f.status === 'processed').length,
    files_unchanged: files.filter((f) => f.status === 'unchanged').length,
    files_cached: files.filter((f) => f.status === 'cached').length,
    files_failed: files.filter((f) => f.status === 'failed').length,
    elements_documented: results.length,
    elements_skipped: files.reduce((sum, f) => sum + f.skipped.length, 0),
    elements_exhausted: results.filter((r) => r.outcome === 'exhausted').length,
    average_confidence: results.length > 0 ? Math.round((totalConfidence / results.length) * 10000) / 10000 : 0,
    duration_ms: durationMs,
  };
}

function failedResult(filePath: string, fingerprint: string, error: unknown, startTime: number): FileResult {
  const name = error instanceof Error ? error.name : 'Error';
  return {
    path: filePath,
    status: 'failed',
    results: [],
    skipped: [],
    edits: [],
    fingerprint,
    error: {
      name,
      message: errorMessage(error),
      ...(error instanceof ParseError ? { line: error.line, column: error.column } : {}),
    },
    durationMs: Date.now() - startTime,
  };
}
