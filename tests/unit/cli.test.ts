/**
 * End-to-end tests for the dataflag CLI against a scratch database
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { runCli } from '../../src/cli/index.js';
import { restoreConfig, snapshotConfig, type Config } from '../../src/config/index.js';
import { cleanupDbFiles } from '../fixtures/db-utils.js';

const TEST_DB_PATH = './data/test-cli.db';

let configSnapshot: Config;

async function cli(...args: string[]): Promise<unknown> {
  vi.mocked(console.log).mockClear();
  await runCli(['--db', TEST_DB_PATH, ...args]);
  const printed = vi.mocked(console.log).mock.calls.at(-1)?.[0];
  return typeof printed === 'string' ? JSON.parse(printed) : undefined;
}

describe('dataflag CLI', () => {
  beforeEach(() => {
    configSnapshot = snapshotConfig();
    cleanupDbFiles(TEST_DB_PATH);
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    vi.spyOn(process, 'exit').mockImplementation((code) => {
      throw new Error(`process.exit: ${String(code)}`);
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
    restoreConfig(configSnapshot);
    cleanupDbFiles(TEST_DB_PATH);
  });

  it('should record an opinion and vote it into a flag', async () => {
    expect(await cli('revision', 'create', 'r1')).toMatchObject({ name: 'r1' });
    await cli('opinion-type', 'create', 'manual');
    await cli('type', 'create', 'vote');
    expect(await cli('user', 'add', 'alice')).toMatchObject({ userName: 'Alice' });

    const opinion = await cli(
      'opinion', 'create',
      '--user', 'alice',
      '--type', 'manual',
      '--decision', 'bad',
      '--lsd', '2112',
      '--revision', 'r1',
      '--instrument', 'chime',
      '--freq', '3,5'
    );
    expect(opinion).toMatchObject({
      userName: 'Alice',
      decision: 'bad',
      lsd: 2112,
      metadata: { instrument: 'chime', freq: [3, 5] },
    });

    expect(await cli('vote', 'run', '--mode', 'hypnotoad', '--revision', 'r1')).toEqual({
      mode: 'hypnotoad',
      revision: 'r1',
      lowWaterMark: 0,
      candidates: 1,
      flagged: 1,
      contested: 0,
    });

    const flags = await cli('flag', 'list');
    expect(flags).toMatchObject({
      count: 1,
      flags: [
        { typeName: 'vote', metadata: { instrument: 'chime', freq: [3, 5], user: 'Alice' } },
      ],
    });

    const rerun = await cli('vote', 'run', '--mode', 'hypnotoad', '--revision', 'r1');
    expect(rerun).toMatchObject({ candidates: 0, flagged: 0 });

    expect(await cli('vote', 'list', '--lsd', '2112')).toMatchObject({ count: 1 });
  });

  it('should print table output when asked', async () => {
    await cli('revision', 'create', 'r1');
    vi.mocked(console.log).mockClear();

    await runCli(['--db', TEST_DB_PATH, '--format', 'table', 'revision', 'list']);

    expect(console.log).toHaveBeenCalledWith(
      'Count: 1\n\nid | name | description\n---+------+------------\n1  | r1   |            '
    );
  });

  it('should report errors as JSON on stderr and exit 1', async () => {
    await cli('revision', 'create', 'r1');

    await expect(
      runCli(['--db', TEST_DB_PATH, 'vote', 'run', '--mode', 'majority', '--revision', 'r1'])
    ).rejects.toThrow('process.exit: 1');

    const printed = vi.mocked(console.error).mock.calls.at(-1)?.[0];
    expect(typeof printed === 'string' ? JSON.parse(printed) : undefined).toMatchObject({
      error: `Invalid value for 'mode': "majority" (choose one of hypnotoad)`,
      code: 'E3000',
    });
  });
});
