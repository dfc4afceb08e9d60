import { describe, test } from 'node:test';
import assert from 'node:assert';
import { runProcess } from './process';

const node = process.execPath;

describe('runProcess', () => {
  test('reports the exit code of the process', async () => {
    const result = await runProcess(node, ['-e', 'process.exit(3)']);
    assert.strictEqual(result.exitCode, 3);
    assert.ok(result.durationMs >= 0);
  });

  test('reports 124 when the process outlives its timeout', { timeout: 10_000 }, async () => {
    const result = await runProcess(node, ['-e', 'setTimeout(() => {}, 10000)'], { timeout: 100 });
    assert.strictEqual(result.exitCode, 124);
  });

  test('reports 128 + signal number when the process is killed', async () => {
    const terminated = await runProcess(node, ['-e', "process.kill(process.pid, 'SIGTERM')"]);
    assert.strictEqual(terminated.exitCode, 143);
    const killed = await runProcess(node, ['-e', "process.kill(process.pid, 'SIGKILL')"]);
    assert.strictEqual(killed.exitCode, 137);
  });

  test('passes extra environment variables', async () => {
    const result = await runProcess(node, ['-e', 'process.exit(Number(process.env.EXIT_WITH))'], {
      env: { EXIT_WITH: '5' },
    });
    assert.strictEqual(result.exitCode, 5);
  });

  test('rejects when the command cannot be spawned', async () => {
    await assert.rejects(runProcess('simulation-queue-missing-binary', []), { code: 'ENOENT' });
  });
});
