import { describe, it, expect, beforeEach, afterEach, vi, type MockInstance } from 'vitest';

// ── Hoisted mock variables ─────────────────────────────────────────────────────

const { mockExistsSync, mockReadFileSync } = vi.hoisted(() => ({
  mockExistsSync: vi.fn(),
  mockReadFileSync: vi.fn(),
}));

// ── Mocks ──────────────────────────────────────────────────────────────────────

vi.mock('node:fs', () => ({
  existsSync: (...args: unknown[]) => mockExistsSync(...args),
  readFileSync: (...args: unknown[]) => mockReadFileSync(...args),
  mkdirSync: vi.fn(),
  writeFileSync: vi.fn(),
}));

vi.mock('node:os', () => ({
  homedir: () => '/mock-home',
}));

vi.mock('chalk', () => {
  const passthrough = (s: string) => s;
  const handler: ProxyHandler<typeof passthrough> = {
    get: () => new Proxy(passthrough, handler),
    apply: (_target, _thisArg, args: [string]) => args[0],
  };
  return { default: new Proxy(passthrough, handler) };
});

import { createProgram } from '../program.js';
import { setOutputMode } from '../../utils/output.js';

// ── Helpers ─────────────────────────────────────────────────────────────────────

const CONFIG_PATH = '/mock-home/.slack-relay/config.json';

async function run(...args: string[]): Promise<void> {
  const program = createProgram();
  program.exitOverride();
  await program.parseAsync(args, { from: 'user' });
}

function files(contents: Record<string, string>): void {
  mockExistsSync.mockImplementation((path: unknown) => String(path) in contents);
  mockReadFileSync.mockImplementation((path: unknown) => {
    const key = String(path);
    if (key in contents) return contents[key];
    throw new Error(`ENOENT: no such file or directory, open '${key}'`);
  });
}

function eventFile(event: Record<string, unknown>): string {
  return JSON.stringify({ type: 'event_callback', event });
}

const mention = {
  type: 'app_mention',
  user: 'U123',
  channel: 'C456',
  text: '<@U0BOT> status?',
  ts: '1700000000.000100',
};

const plainMessage = {
  type: 'message',
  user: 'U123',
  channel: 'C456',
  channel_type: 'channel',
  text: 'status?',
  ts: '1700000000.000100',
};

// ── Tests ──────────────────────────────────────────────────────────────────────

describe('admit command', () => {
  let stdoutSpy: MockInstance;
  let stderrSpy: MockInstance;

  const output = () => stdoutSpy.mock.calls.map((call) => String(call[0])).join('');

  beforeEach(() => {
    mockExistsSync.mockReset();
    mockReadFileSync.mockReset();
    vi.stubEnv('NO_COLOR', '');
    vi.stubEnv('SLACK_RELAY_LOG_LEVEL', 'error');
    vi.stubEnv('SLACK_BOT_TOKEN', '');
    vi.stubEnv('SLACK_BOT_USER_ID', '');
    process.exitCode = undefined;
    stdoutSpy = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
    stderrSpy = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
  });

  afterEach(() => {
    stdoutSpy.mockRestore();
    stderrSpy.mockRestore();
    vi.unstubAllEnvs();
    setOutputMode('human');
    process.exitCode = undefined;
  });

  it('shows an admitted mention with its stripped text', async () => {
    files({ 'event.json': eventFile(mention) });

    await run('admit', 'event.json', '--bot-user-id', 'U0BOT');

    expect(output()).toBe('  Admitted in C456 (thread 1700000000.000100)\n  Text: status?\n');
  });

  it('shows why an event is ignored', async () => {
    files({ 'event.json': eventFile(plainMessage) });

    await run('admit', 'event.json', '--bot-user-id', 'U0BOT');

    expect(output()).toBe('  Ignored: mention required\n');
  });

  it('takes the bot user ID from the environment', async () => {
    vi.stubEnv('SLACK_BOT_USER_ID', 'U0BOT');
    files({ 'event.json': eventFile({ ...mention, type: 'message', channel_type: 'channel' }) });

    await run('admit', 'event.json');

    expect(output()).toBe('  Ignored: superseded by mention event\n');
  });

  it('applies the policy from the config file', async () => {
    files({
      [CONFIG_PATH]: JSON.stringify({ group: { mode: 'allowlist', allowFrom: ['C999'] } }),
      'event.json': eventFile(mention),
    });

    await run('admit', 'event.json', '--bot-user-id', 'U0BOT');

    expect(output()).toBe('  Ignored: channel not allowlisted\n');
  });

  it('prints the decision and the forwarded envelope with --json', async () => {
    files({ 'event.json': eventFile(mention) });

    await run('--json', 'admit', 'event.json', '--bot-user-id', 'U0BOT');

    const result = JSON.parse(output());
    expect(result.decision).toEqual({
      action: 'admit',
      text: 'status?',
      threadToken: '1700000000.000100',
      chatId: 'C456',
      senderId: 'U123',
      channelType: 'channel',
    });
    expect(result.envelope).toEqual({
      channel: 'slack',
      platformMessageId: '1700000000.000100',
      conversationId: 'C456',
      threadId: '1700000000.000100',
      peerId: 'U123',
      text: 'status?',
      channelType: 'channel',
      isGroup: true,
      timestamp: '2023-11-14T22:13:20.000Z',
    });
  });

  it('omits the envelope for ignored events with --json', async () => {
    files({ 'event.json': eventFile(plainMessage) });

    await run('--json', 'admit', 'event.json', '--bot-user-id', 'U0BOT');

    expect(JSON.parse(output())).toEqual({
      decision: { action: 'ignore', reason: 'mention required' },
    });
  });

  it('rejects payloads that are not events with exit code 2', async () => {
    files({ 'event.json': '{"ok":true}' });

    await run('admit', 'event.json');

    expect(stderrSpy).toHaveBeenCalledWith('\n  Error: Input is not a Slack event payload.\n');
    expect(process.exitCode).toBe(2);
    expect(stdoutSpy).not.toHaveBeenCalled();
  });

  it('reports invalid JSON with exit code 1', async () => {
    files({ 'event.json': 'not json' });

    await run('admit', 'event.json');

    expect(stderrSpy).toHaveBeenCalledWith(
      expect.stringContaining('Error: Admission check failed:')
    );
    expect(process.exitCode).toBe(1);
  });
});
