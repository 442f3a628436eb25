import { describe, it } from 'node:test';
import assert from 'node:assert';
import { runCli, VERSION } from '../src/program.js';

const FIXTURES = 'test/fixtures';

type RunResult = {
  exitCode: number;
  stdout: string[];
  stderr: string[];
};

function run(...args: string[]): RunResult {
  const stdout: string[] = [];
  const stderr: string[] = [];
  const exitCode = runCli(args, {
    out: (line) => stdout.push(line),
    err: (line) => stderr.push(line),
  });
  return { exitCode, stdout, stderr };
}

describe('valid files', () => {
  it('valid.py passes with no errors', () => {
    const result = run(`${FIXTURES}/valid.py`);
    assert.strictEqual(result.exitCode, 0);
    assert.deepStrictEqual(result.stderr, []);
  });
});

describe('invalid.py', () => {
  const file = `${FIXTURES}/invalid.py`;
  const result = run(file);

  it('exits with code 1', () => {
    assert.strictEqual(result.exitCode, 1);
  });

  it('reports every literal in file:line:col: message format', () => {
    assert.deepStrictEqual(result.stderr, [
      `${file}:1:8: NSP001 DEC Invalid`,
      `${file}:2:10: NSP001 DEC Invalid`,
      `${file}:3:12: NSP011 BIN Invalid`,
      `${file}:4:11: NSP031 HEX Invalid`,
      `${file}:5:12: NSP021 OCT Invalid`,
    ]);
  });

  it('filters by selected code prefixes', () => {
    const selected = run('--select', 'NSP01,NSP02', file);
    assert.deepStrictEqual(selected.stderr, [
      `${file}:3:12: NSP011 BIN Invalid`,
      `${file}:5:12: NSP021 OCT Invalid`,
    ]);
  });

  it('drops ignored code prefixes', () => {
    const ignored = run('--ignore', 'NSP001', file);
    assert.deepStrictEqual(ignored.stderr, [
      `${file}:3:12: NSP011 BIN Invalid`,
      `${file}:4:11: NSP031 HEX Invalid`,
      `${file}:5:12: NSP021 OCT Invalid`,
    ]);
  });

  it('exits with code 0 when everything is ignored', () => {
    assert.strictEqual(run('--ignore', 'NSP', file).exitCode, 0);
  });
});

describe('unimplemented families', () => {
  it('aborts the file with code 2', () => {
    const file = `${FIXTURES}/float.py`;
    const result = run(file);
    assert.strictEqual(result.exitCode, 2);
    assert.deepStrictEqual(result.stderr, [
      `error: ${file}:2:5: NSP041 POINTFLOAT separator validation is not implemented`,
    ]);
  });

  it('prints diagnostics found before the error', () => {
    const file = `${FIXTURES}/partial.py`;
    const result = run(file);
    assert.strictEqual(result.exitCode, 2);
    assert.deepStrictEqual(result.stderr, [
      `${file}:1:10: NSP001 DEC Invalid`,
      `error: ${file}:2:5: NSP041 POINTFLOAT separator validation is not implemented`,
    ]);
  });

  it('keeps checking the remaining files', () => {
    const result = run(`${FIXTURES}/float.py`, `${FIXTURES}/invalid.py`);
    assert.strictEqual(result.exitCode, 2);
    assert.strictEqual(result.stderr.length, 6);
  });
});

describe('file not found', () => {
  it('exits with code 1 for missing file', () => {
    const result = run(`${FIXTURES}/nonexistent.py`);
    assert.strictEqual(result.exitCode, 1);
    assert.match(result.stderr[0], /^error: ENOENT/);
  });
});

describe('program options', () => {
  it('prints the version', () => {
    const result = run('--version');
    assert.strictEqual(result.exitCode, 0);
    assert.deepStrictEqual(result.stdout, [VERSION]);
  });

  it('fails without files', () => {
    const result = run();
    assert.strictEqual(result.exitCode, 1);
    assert.match(result.stderr[0], /missing required argument 'files'/);
  });
});
