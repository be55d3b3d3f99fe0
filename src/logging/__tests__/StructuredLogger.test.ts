import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, describe, expect, it } from 'vitest';
import { StructuredLogger } from '../StructuredLogger';

describe('StructuredLogger', () => {
  let logDir: string | undefined;

  afterEach(async () => {
    if (logDir) {
      await fs.rm(logDir, { recursive: true, force: true });
      logDir = undefined;
    }
  });

  it('writes JSON lines that carry the child context', async () => {
    logDir = await fs.mkdtemp(path.join(os.tmpdir(), 'voxshell-log-'));
    const logger = await StructuredLogger.create(logDir, { consoleLevel: 'error' });
    const child = logger.child({ component: 'transport' });

    child.info('Realtime transport connected', { attempt: 1 });
    logger.debug('root entry');
    await logger.flush();

    const lines = (await fs.readFile(logger.getLogPath(), 'utf8')).trim().split('\n');
    const first: unknown = JSON.parse(lines[0]);

    expect(path.dirname(logger.getLogPath())).toBe(logDir);
    expect(lines).toHaveLength(2);
    expect(first).toMatchObject({
      level: 'info',
      message: 'Realtime transport connected',
      component: 'transport',
      attempt: 1
    });
  });
});
