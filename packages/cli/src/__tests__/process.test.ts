import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import { tmpdir } from 'os';
import { setLogPath } from '../logger';
import { COMMAND_NOT_FOUND, NodeCommandRunner } from '../services/process.service';

describe('NodeCommandRunner', () => {
  let tempDir: string;
  const runner = new NodeCommandRunner();

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(tmpdir(), 'minidev-process-'));
    setLogPath(path.join(tempDir, 'debug.log'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  describe('run', () => {
    it('should capture output and the exit code', async () => {
      const result = await runner.run('sh', ['-c', 'echo out; echo err >&2; exit 3']);

      expect(result).toEqual({ code: 3, stdout: 'out\n', stderr: 'err\n' });
    });

    it('should pipe input to stdin', async () => {
      expect(await runner.run('cat', [], { input: 'kind: Namespace\n' })).toEqual({
        code: 0,
        stdout: 'kind: Namespace\n',
        stderr: '',
      });
    });

    it('should close stdin when there is no input', async () => {
      expect(await runner.run('cat', [])).toEqual({ code: 0, stdout: '', stderr: '' });
    });

    it('should report a missing binary as command not found', async () => {
      const result = await runner.run('minidev-missing-binary', ['--version']);

      expect(result.code).toBe(COMMAND_NOT_FOUND);
    });

    it('should record the command in the debug log', async () => {
      await runner.run('sh', ['-c', 'exit 0']);

      const log = fs.readFileSync(path.join(tempDir, 'debug.log'), 'utf-8');
      expect(log).toContain('[CMD] Executing: sh -c exit 0\n');
    });
  });

  describe('interactive', () => {
    it('should resolve with the exit code', async () => {
      expect(await runner.interactive('sh', ['-c', 'exit 4'])).toBe(4);
    });

    it('should have written the output file when it resolves', async () => {
      const target = path.join(tempDir, 'dump.sql');

      const code = await runner.interactive('sh', ['-c', 'echo "CREATE TABLE t();"'], { stdoutPath: target });

      expect(code).toBe(0);
      expect(fs.readFileSync(target, 'utf-8')).toBe('CREATE TABLE t();\n');
    });

    it('should stream a local file to stdin', async () => {
      const source = path.join(tempDir, 'restore.sql');
      const target = path.join(tempDir, 'copy.sql');
      fs.writeFileSync(source, 'INSERT INTO t VALUES (1);\n');

      expect(await runner.interactive('cat', [], { stdinPath: source, stdoutPath: target })).toBe(0);
      expect(fs.readFileSync(target, 'utf-8')).toBe('INSERT INTO t VALUES (1);\n');
    });

    it('should fail when the output file cannot be created', async () => {
      const target = path.join(tempDir, 'missing', 'dump.sql');

      expect(await runner.interactive('sh', ['-c', 'echo hello'], { stdoutPath: target })).toBe(1);
      expect(fs.existsSync(target)).toBe(false);
    });

    it('should stop the process when the input file cannot be read', async () => {
      const source = path.join(tempDir, 'missing.sql');

      expect(await runner.interactive('cat', [], { stdinPath: source })).toBe(1);
    });

    it('should report a missing binary as command not found', async () => {
      expect(await runner.interactive('minidev-missing-binary', [])).toBe(COMMAND_NOT_FOUND);
    });
  });
});
