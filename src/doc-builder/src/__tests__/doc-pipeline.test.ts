/**
 * Tests for DocPipeline, the concurrency helpers and SourceFinder.
 * Runs rule-based only (provider none); files live in a temp directory.
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { DocPipeline } from '../refinement/DocPipeline';
import { mergeConfigLayers } from '../config/ConfigResolver';
import { ResultCache } from '../cache/ResultCache';
import { SourceFinder, isPythonSource } from '../core/SourceFinder';
import { mapInChunks, withDeadline } from '../utils/concurrency';
import { PipelineConfig } from '../types';

const CONFIG: PipelineConfig = mergeConfigLayers([]).config;

const ADD_SOURCE = 'def add(a, b):\n    return a + b\n';

const ADD_OUTPUT = [
  'def add(a, b):',
  '    """add function.',
  '',
  '    Args:',
  '        a (float): Description of a.',
  '        b (float): Description of b.',
  '',
  '    Returns:',
  '        float: Description of return value.',
  '    """',
  '    return a + b',
  '',
].join('\n');

describe('DocPipeline', () => {
  describe('processSource', () => {
    const pipeline = new DocPipeline(CONFIG);

    it('documents an undocumented function', async () => {
      const result = await pipeline.processSource(ADD_SOURCE, 'add.py');

      expect(result.status).toBe('processed');
      expect(result.output).toBe(ADD_OUTPUT);
      expect(result.results.map((r) => [r.qualifiedName, r.outcome, r.confidenceScore])).toEqual([
        ['add', 'accepted', 1],
      ]);
      expect(result.edits.map((e) => [e.qualifiedName, e.action, e.line])).toEqual([['add', 'inserted', 2]]);
    });

    it('gives the same output on every run', async () => {
      const first = await pipeline.processSource(ADD_SOURCE, 'add.py');
      const second = await pipeline.processSource(ADD_SOURCE, 'add.py');

      expect(second.output).toBe(first.output);
      expect(second.fingerprint).toBe(first.fingerprint);
    });

    it('leaves an empty file unchanged', async () => {
      const result = await pipeline.processSource('', 'empty.py');

      expect(result.status).toBe('unchanged');
      expect(result.output).toBe('');
      expect(result.results).toEqual([]);
    });

    it('skips elements that already have a docstring', async () => {
      const source = 'def f(x):\n    """Old."""\n    return x\n';
      const result = await pipeline.processSource(source, 'f.py');

      expect(result.status).toBe('unchanged');
      expect(result.output).toBe(source);
      expect(result.skipped).toEqual([{ qualifiedName: 'f', reason: 'existing-doc' }]);
      expect(result.results).toEqual([]);
    });

    it('reports invalid source as failed without output', async () => {
      const result = await pipeline.processSource('def f()\n    pass\n', 'bad.py');

      expect(result.status).toBe('failed');
      expect(result.output).toBeUndefined();
      expect(result.error?.name).toBe('ParseError');
      expect(result.error?.line).toBe(1);
    });

    it('stops when the signal is aborted', async () => {
      const controller = new AbortController();
      controller.abort();

      const result = await pipeline.processSource(ADD_SOURCE, 'add.py', controller.signal);
      expect(result.status).toBe('failed');
      expect(result.output).toBeUndefined();
    });
  });

  describe('fingerprint', () => {
    it('depends on the settings that change output', () => {
      const base = new DocPipeline(CONFIG).fingerprint(ADD_SOURCE);

      expect(new DocPipeline(CONFIG).fingerprint(ADD_SOURCE)).toBe(base);
      expect(new DocPipeline({ ...CONFIG, style: 'numpy' }).fingerprint(ADD_SOURCE)).not.toBe(base);
      expect(new DocPipeline({ ...CONFIG, threshold: 0.5 }).fingerprint(ADD_SOURCE)).not.toBe(base);
      expect(new DocPipeline({ ...CONFIG, concurrency: 1 }).fingerprint(ADD_SOURCE)).toBe(base);
    });
  });

  describe('processFiles', () => {
    let dir: string;

    beforeEach(() => {
      dir = fs.mkdtempSync(path.join(os.tmpdir(), 'docsmith-pipeline-'));
      fs.writeFileSync(path.join(dir, 'b.py'), ADD_SOURCE);
      fs.writeFileSync(path.join(dir, 'a.py'), 'def f()\n    pass\n');
    });

    afterEach(() => {
      fs.rmSync(dir, { recursive: true, force: true });
    });

    it('returns files sorted by path and writes only good ones', async () => {
      const pipeline = new DocPipeline({ ...CONFIG, concurrency: 2 });
      const finished: string[] = [];

      const batch = await pipeline.processFiles([path.join(dir, 'b.py'), path.join(dir, 'a.py')], {
        write: true,
        onFile: (result) => finished.push(path.basename(result.path)),
      });

      expect(batch.files.map((f) => [path.basename(f.path), f.status])).toEqual([
        ['a.py', 'failed'],
        ['b.py', 'processed'],
      ]);
      expect(finished.sort()).toEqual(['a.py', 'b.py']);
      expect(fs.readFileSync(path.join(dir, 'b.py'), 'utf-8')).toBe(ADD_OUTPUT);
      expect(fs.readFileSync(path.join(dir, 'a.py'), 'utf-8')).toBe('def f()\n    pass\n');
      expect(batch.statistics.files_total).toBe(2);
      expect(batch.statistics.files_failed).toBe(1);
      expect(batch.statistics.elements_documented).toBe(1);
    });

    it('does not write without the write option', async () => {
      await new DocPipeline(CONFIG).processFiles([path.join(dir, 'b.py')]);
      expect(fs.readFileSync(path.join(dir, 'b.py'), 'utf-8')).toBe(ADD_SOURCE);
    });

    it('reports a missing file as failed', async () => {
      const batch = await new DocPipeline(CONFIG).processFiles([path.join(dir, 'missing.py')]);

      expect(batch.files[0]?.status).toBe('failed');
      expect(batch.files[0]?.error?.name).toBe('FileProcessingError');
    });

    it('reuses cached results when resuming', async () => {
      const storagePath = path.join(dir, 'cache.json');
      const pipeline = new DocPipeline(CONFIG);
      const file = path.join(dir, 'b.py');

      await pipeline.processFiles([file], { cache: new ResultCache({ storagePath }) });
      const resumed = await pipeline.processFiles([file], {
        resume: true,
        cache: new ResultCache({ storagePath }),
      });

      expect(resumed.files[0]?.status).toBe('cached');
      expect(resumed.files[0]?.output).toBe(ADD_OUTPUT);
      expect(resumed.statistics.files_cached).toBe(1);
    });
  });
});

describe('mapInChunks', () => {
  it('keeps input order whatever the completion order', async () => {
    const delays = [30, 0, 10, 0, 20];
    const results = await mapInChunks(delays, 2, async (ms, index) => {
      await new Promise((resolve) => setTimeout(resolve, ms));
      return index;
    });

    expect(results).toEqual([0, 1, 2, 3, 4]);
  });

  it('never runs more than the limit at once', async () => {
    let running = 0;
    let peak = 0;
    await mapInChunks([1, 2, 3, 4, 5], 2, async () => {
      running++;
      peak = Math.max(peak, running);
      await new Promise((resolve) => setTimeout(resolve, 1));
      running--;
    });

    expect(peak).toBe(2);
  });
});

describe('withDeadline', () => {
  it('returns the task result in time', async () => {
    expect(await withDeadline(1000, async () => 'done')).toBe('done');
  });

  it('aborts the task signal when the deadline passes', async () => {
    const seen: { signal?: AbortSignal } = {};
    const never = (signal: AbortSignal): Promise<string> => {
      seen.signal = signal;
      return new Promise(() => {});
    };

    await expect(withDeadline(10, never)).rejects.toThrow('timed out after 10ms');
    expect(seen.signal?.aborted).toBe(true);
  });
});

describe('SourceFinder', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'docsmith-finder-'));
    fs.mkdirSync(path.join(dir, 'pkg'));
    fs.mkdirSync(path.join(dir, 'node_modules'));
    fs.writeFileSync(path.join(dir, 'main.py'), 'x = 1\n');
    fs.writeFileSync(path.join(dir, 'pkg', 'util.py'), 'y = 2\n');
    fs.writeFileSync(path.join(dir, 'node_modules', 'vendored.py'), 'z = 3\n');
    fs.writeFileSync(path.join(dir, 'notes.txt'), 'not python\n');
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('finds Python files and honours excludes', async () => {
    const files = await new SourceFinder().find(dir);
    expect(files.map((f) => path.relative(dir, f))).toEqual(['main.py', path.join('pkg', 'util.py')]);
  });

  it('stays at the top level when not recursive', async () => {
    const files = await new SourceFinder({ recursive: false }).find(dir);
    expect(files.map((f) => path.relative(dir, f))).toEqual(['main.py']);
  });

  it('returns an explicit file as is', async () => {
    const file = path.join(dir, 'notes.txt');
    expect(await new SourceFinder().find(file)).toEqual([path.resolve(file)]);
  });
});

describe('isPythonSource', () => {
  it('recognises extensions and shebangs', () => {
    expect(isPythonSource('tool.py')).toBe(true);
    expect(isPythonSource('stubs.PYI')).toBe(true);
    expect(isPythonSource('tool', '#!/usr/bin/env python3\nprint(1)\n')).toBe(true);
    expect(isPythonSource('tool.sh', '#!/bin/sh\n')).toBe(false);
  });
});
