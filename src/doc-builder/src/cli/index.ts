#!/usr/bin/env node
/**
 * docsmith CLI - Write structured docstrings into Python sources.
 *
 * Commands:
 *   generate <file>   Document one file
 *   batch <dir>       Document every Python file under a directory
 *   analyze <file>    Show the elements found in a file
 *   styles            List the docstring styles
 *
 * Rewritten code and reports go to stdout; progress and errors go to
 * stderr.
 */

import { Command } from 'commander';
import * as fs from 'fs/promises';
import * as path from 'path';
import { CodeElement, PipelineConfig } from '../types';
import { ConfigResolver } from '../config/ConfigResolver';
import { ConfigError, errorMessage } from '../core/errors';
import { SourceFinder, isPythonSource } from '../core/SourceFinder';
import { DocPipeline } from '../refinement/DocPipeline';
import { ResultCache } from '../cache/ResultCache';
import { ReportGenerator, formatEdits, isReportFormat } from '../report/ReportGenerator';
import { STYLE_TEMPLATES, displayName, displayType } from '../generation/StyleTemplates';

interface SharedOptions {
  style?: string;
  threshold?: string;
  maxIterations?: string;
  overwrite?: boolean;
  provider?: string;
  model?: string;
  config?: string;
  verbose?: boolean;
}

interface GenerateOptions extends SharedOptions {
  output?: string;
  stdout?: boolean;
  diff?: boolean;
}

interface BatchOptions extends SharedOptions {
  recursive?: boolean;
  concurrency?: string;
  report?: string;
  format: string;
  resume?: boolean;
  cache?: string;
  dryRun?: boolean;
}

interface AnalyzeOptions {
  json?: boolean;
  config?: string;
}

const DEFAULT_CACHE_PATH = path.join('.docsmith', 'cache.json');

const program = new Command();

program
  .name('docsmith')
  .description('Structured docstring synthesis for Python sources')
  .version('0.1.0');

function withSharedOptions(command: Command): Command {
  return command
    .option('-s, --style <style>', 'Docstring style: google, numpy, rst')
    .option('-t, --threshold <value>', 'Confidence needed to accept a docstring')
    .option('-n, --max-iterations <count>', 'Refinement iterations per element')
    .option('--overwrite', 'Replace docstrings that already exist')
    .option('--provider <provider>', 'Text backend: none, groq, ollama')
    .option('--model <model>', 'Model name for the text backend')
    .option('-c, --config <file>', 'Configuration file (default: .docsmithrc*)')
    .option('--verbose', 'Verbose output');
}

async function loadConfig(options: SharedOptions, extra: Partial<Record<keyof PipelineConfig, unknown>> = {}) {
  const resolver = new ConfigResolver({ projectPath: process.cwd(), rcPath: options.config });
  const resolved = await resolver.resolveWithSources({
    style: options.style,
    threshold: options.threshold,
    maxIterations: options.maxIterations,
    overwrite: options.overwrite,
    provider: options.provider,
    model: options.model,
    ...extra,
  });

  if (options.verbose) {
    const { config, sources } = resolved;
    console.error(`Style: ${config.style}, threshold: ${config.threshold}, max iterations: ${config.maxIterations}`);
    console.error(`Provider: ${config.provider}${config.model ? ` (${config.model})` : ''}`);
    for (const [key, source] of Object.entries(sources)) {
      console.error(`  ${key} from ${source}`);
    }
  }
  return resolved.config;
}

function reportFailure(context: string, error: unknown): never {
  if (error instanceof ConfigError) {
    console.error(`Configuration error (${error.key} from ${error.source}): ${error.message}`);
  } else {
    console.error(`${context}:`, errorMessage(error));
  }
  process.exit(1);
}

// Generate command
withSharedOptions(
  program
    .command('generate')
    .description('Generate docstrings for one Python file')
    .argument('<file>', 'Python source file')
    .option('-o, --output <file>', 'Write the result here instead of back to the input')
    .option('--stdout', 'Print the rewritten source instead of writing it')
    .option('--diff', 'Print the inserted and replaced docstrings only')
).action(async (file: string, options: GenerateOptions) => {
  try {
    const filePath = path.resolve(file);
    const config = await loadConfig(options);
    const pipeline = new DocPipeline(config);

    const result = await pipeline.processFile(filePath);
    if (result.status === 'failed' || result.output === undefined) {
      const where = result.error?.line !== undefined ? ` (line ${result.error.line}, column ${result.error.column})` : '';
      console.error(`Failed to process ${filePath}: ${result.error?.message ?? 'unknown error'}${where}`);
      process.exit(1);
    }

    if (options.verbose) {
      for (const r of result.results) {
        console.error(`${r.qualifiedName}: ${r.confidenceScore.toFixed(2)} after ${r.iterationsUsed} iteration(s), ${r.outcome}`);
        for (const warning of r.warnings) {
          console.error(`  warning: ${warning}`);
        }
      }
      for (const s of result.skipped) {
        console.error(`${s.qualifiedName}: skipped (existing docstring)`);
      }
    }

    if (options.diff) {
      console.log(formatEdits(filePath, result.edits));
    } else if (options.stdout) {
      process.stdout.write(result.output);
    } else if (options.output) {
      await fs.writeFile(path.resolve(options.output), result.output, 'utf-8');
      console.error(`Wrote ${options.output} (${result.edits.length} docstring(s))`);
    } else if (result.status === 'processed') {
      await fs.writeFile(filePath, result.output, 'utf-8');
      console.error(`Updated ${filePath} (${result.edits.length} docstring(s))`);
    } else {
      console.error(`No changes for ${filePath}`);
    }
  } catch (error) {
    reportFailure('Generation failed', error);
  }
});

// Batch command
withSharedOptions(
  program
    .command('batch')
    .description('Generate docstrings for every Python file in a directory')
    .argument('<dir>', 'Directory to process')
    .option('-r, --recursive', 'Descend into subdirectories')
    .option('-j, --concurrency <count>', 'Files processed at once')
    .option('--report <file>', 'Write a run report to this file')
    .option('-f, --format <format>', 'Report format: md, json', 'md')
    .option('--resume', 'Skip files whose results are cached')
    .option('--cache <file>', `Result cache location (default: ${DEFAULT_CACHE_PATH})`)
    .option('--dry-run', 'Process files without writing them')
).action(async (dir: string, options: BatchOptions) => {
  try {
    if (!isReportFormat(options.format)) {
      console.error(`Unknown report format '${options.format}' (expected md or json)`);
      process.exit(1);
    }
    const format = options.format;
    const root = path.resolve(dir);
    const config = await loadConfig(options, { concurrency: options.concurrency });

    const finder = new SourceFinder({
      include: config.include,
      exclude: config.exclude,
      recursive: options.recursive === true,
    });
    const files = await finder.find(root);
    if (files.length === 0) {
      console.error(`No Python files found in ${root}`);
      return;
    }
    console.error(`Processing ${files.length} file(s) with concurrency ${config.concurrency}`);

    const controller = new AbortController();
    const onInterrupt = (): void => {
      console.error('Interrupted, cancelling remaining work...');
      controller.abort(new Error('interrupted'));
    };
    process.once('SIGINT', onInterrupt);

    const cache =
      options.resume || options.cache
        ? new ResultCache({ storagePath: path.resolve(options.cache ?? DEFAULT_CACHE_PATH) })
        : undefined;
    const pipeline = new DocPipeline(config);
    const batch = await pipeline.processFiles(files, {
      write: !options.dryRun,
      resume: options.resume === true,
      cache,
      signal: controller.signal,
      onFile: (result) => {
        if (result.status === 'failed') {
          console.error(`  ✗ ${path.relative(root, result.path)}: ${result.error?.message ?? 'failed'}`);
        } else if (options.verbose) {
          console.error(`  ✓ ${path.relative(root, result.path)}: ${result.status}, ${result.results.length} docstring(s)`);
        }
      },
    });
    process.removeListener('SIGINT', onInterrupt);

    const stats = batch.statistics;
    console.error('\n--- Summary ---');
    console.error(`Files: ${stats.files_total} (rewritten ${stats.files_processed}, unchanged ${stats.files_unchanged}, cached ${stats.files_cached}, failed ${stats.files_failed})`);
    console.error(`Elements documented: ${stats.elements_documented}, skipped: ${stats.elements_skipped}, below threshold: ${stats.elements_exhausted}`);
    console.error(`Average confidence: ${stats.average_confidence.toFixed(2)}`);
    if (options.dryRun) {
      console.error('Dry run: no files were written');
    }

    if (options.report) {
      const report = new ReportGenerator(batch, { relativeTo: root }).generate(format);
      await fs.writeFile(path.resolve(options.report), report, 'utf-8');
      console.error(`Report written to: ${options.report}`);
    }

    if (stats.files_failed > 0) {
      process.exit(1);
    }
  } catch (error) {
    reportFailure('Batch run failed', error);
  }
});

function describeElement(element: CodeElement): string {
  const params = element.parameters
    .map((p) => {
      const type = displayType(p.declaredType, p.inferredType);
      return type ? `${displayName(p)}: ${type}` : displayName(p);
    })
    .join(', ');
  const returns = element.returns ? displayType(element.returns.declaredType, element.returns.inferredType) : undefined;
  const signature = element.kind === 'class' ? element.qualifiedName : `${element.qualifiedName}(${params})`;
  return returns ? `${signature} -> ${returns}` : signature;
}

// Analyze command
program
  .command('analyze')
  .description('Show the documentable elements of a Python file')
  .argument('<file>', 'Python source file')
  .option('--json', 'Output JSON')
  .option('-c, --config <file>', 'Configuration file (default: .docsmithrc*)')
  .action(async (file: string, options: AnalyzeOptions) => {
    try {
      const filePath = path.resolve(file);
      const source = await fs.readFile(filePath, 'utf-8');
      if (!isPythonSource(filePath, source)) {
        console.error(`Warning: ${filePath} does not look like a Python file`);
      }

      const config = await loadConfig({ config: options.config });
      const elements = new DocPipeline(config, {}).analyze(source);

      if (options.json) {
        const data = elements.map((e) => ({
          kind: e.kind,
          name: e.qualifiedName,
          line: e.sourceSpan.startLine,
          parameters: e.parameters.map((p) => ({
            name: p.name,
            kind: p.kind,
            type: displayType(p.declaredType, p.inferredType) ?? null,
            default: p.defaultValue ?? null,
          })),
          returns: e.returns
            ? {
                type: displayType(e.returns.declaredType, e.returns.inferredType) ?? null,
                generator: e.returns.isGenerator,
              }
            : null,
          raises: e.raises.map((r) => r.kind),
          complexity: e.complexityScore,
          modifiers: e.modifiers,
          documented: e.existingDoc !== undefined,
          ambiguities: e.ambiguities,
        }));
        console.log(JSON.stringify(data, null, 2));
        return;
      }

      console.log(`File: ${filePath}`);
      console.log(`Elements: ${elements.length}`);
      console.log('');
      for (const e of elements) {
        const doc = e.existingDoc ? ' [documented]' : '';
        console.log(`${String(e.sourceSpan.startLine).padStart(5)}  ${e.kind.padEnd(11)} ${describeElement(e)}${doc}`);
        const details = [`complexity ${e.complexityScore}`];
        if (e.raises.length > 0) details.push(`raises ${e.raises.map((r) => r.kind).join(', ')}`);
        if (e.modifiers.length > 0) details.push(e.modifiers.join(', '));
        console.log(`       ${details.join('; ')}`);
        for (const a of e.ambiguities) {
          console.log(`       warning: ${a.target} ${a.name} type unknown (${a.reason})`);
        }
      }
    } catch (error) {
      reportFailure('Analysis failed', error);
    }
  });

// Styles command
program
  .command('styles')
  .description('List the docstring styles')
  .action(() => {
    console.log('Docstring styles:\n');
    for (const template of Object.values(STYLE_TEMPLATES)) {
      console.log(`  ${template.style.padEnd(8)} v${template.version}  ${template.label}`);
    }
  });

program.parse();
