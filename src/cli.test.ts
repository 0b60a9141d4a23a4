import { describe, it, expect, vi, beforeEach } from 'vitest';
import { main, parseArgs, USAGE, type MainDeps } from './cli.js';
import { ConfigError } from './errors.js';
import { DEBUG_DIAGNOSTIC } from './services/orchestrator.service.js';
import { FakeInventoryDb } from './__tests__/fake-db.js';

describe('parseArgs', () => {
  it('defaults every flag to false', () => {
    expect(parseArgs([])).toEqual({
      kind: 'run',
      options: { debug: false, printOutput: false, status: false },
    });
  });

  it('reads long and short flags', () => {
    expect(parseArgs(['--print', '-s'])).toEqual({
      kind: 'run',
      options: { debug: false, printOutput: true, status: true },
    });
    expect(parseArgs(['--debug'])).toEqual({
      kind: 'run',
      options: { debug: true, printOutput: false, status: false },
    });
  });

  it('accepts combined short flags', () => {
    expect(parseArgs(['-dp'])).toEqual({
      kind: 'run',
      options: { debug: true, printOutput: true, status: false },
    });
  });

  it('returns help for -h and --help', () => {
    expect(parseArgs(['-h'])).toEqual({ kind: 'help' });
    expect(parseArgs(['-p', '--help'])).toEqual({ kind: 'help' });
  });

  it('rejects unknown flags and positional arguments', () => {
    expect(() => parseArgs(['-x'])).toThrow(new ConfigError('Unknown option: -x'));
    expect(() => parseArgs(['--verbose'])).toThrow('Unexpected argument: --verbose');
    expect(() => parseArgs(['today'])).toThrow(ConfigError);
    expect(() => parseArgs(['constructor'])).toThrow(ConfigError);
  });
});

describe('main', () => {
  const env = {
    MAIL_FROM: 'bot@example.com',
    API_BASE: 'https://shop.test/api',
    API_USER: 'test-user',
    API_PASS: 'test-secret',
    DATABASE_URL: 'postgres://localhost/test',
  };

  let db: FakeInventoryDb;
  let logs: string[];
  let errors: string[];
  let deps: Partial<MainDeps>;

  const fetchImpl = vi.fn(async (url: string, _init?: RequestInit): Promise<Response> =>
    url === 'https://shop.test/api/products/'
      ? new Response(
          JSON.stringify([{ id: 1, name: 'Spool PLA', type: 'simple', stock_quantity: 5, variations: [] }])
        )
      : new Response('not found', { status: 404 })
  );

  beforeEach(() => {
    vi.clearAllMocks();
    db = new FakeInventoryDb();
    logs = [];
    errors = [];
    deps = {
      createPool: vi.fn(() => db.asPool()),
      createNotifier: () => ({ send: vi.fn(async () => ({ ok: true as const })) }),
      loadEnv: vi.fn(),
      fetchImpl,
      now: () => new Date(2026, 9, 19, 6, 0, 0),
      log: (text) => logs.push(text),
      error: (text) => errors.push(text),
    };
  });

  it('prints usage for --help and exits 0 without loading anything', async () => {
    await expect(main(['--help'], env, deps)).resolves.toBe(0);

    expect(logs).toEqual([USAGE]);
    expect(deps.loadEnv).not.toHaveBeenCalled();
    expect(deps.createPool).not.toHaveBeenCalled();
  });

  it('stores a snapshot, logs start and finish, closes the pool', async () => {
    await expect(main([], env, deps)).resolves.toBe(0);

    expect(logs).toEqual(['[inventory-check] Starting', '[inventory-check] Done. mode=snapshot records=1']);
    expect(errors).toEqual([]);
    expect(db.rows).toHaveLength(1);
    expect(db.end).toHaveBeenCalledTimes(1);
  });

  it('prints only the diagnostic in debug mode', async () => {
    await expect(main(['-d'], env, deps)).resolves.toBe(0);

    expect(logs).toEqual([DEBUG_DIAGNOSTIC]);
    expect(db.end).toHaveBeenCalledTimes(1);
  });

  it('maps an unknown flag to a config failure and exit 1', async () => {
    await expect(main(['-x'], env, deps)).resolves.toBe(1);

    expect(errors).toEqual(['[inventory-check] config failed: Unknown option: -x']);
    expect(deps.createPool).not.toHaveBeenCalled();
  });

  it('maps missing configuration to a config failure and exit 1', async () => {
    await expect(main([], {}, deps)).resolves.toBe(1);

    expect(errors).toHaveLength(1);
    expect(errors[0]).toMatch(/^\[inventory-check\] config failed: /);
    expect(deps.loadEnv).toHaveBeenCalledTimes(1);
    expect(deps.createPool).not.toHaveBeenCalled();
  });

  it('maps a catalog outage to a catalog failure and still closes the pool', async () => {
    fetchImpl.mockResolvedValueOnce(new Response('unavailable', { status: 503 }));

    await expect(main([], env, deps)).resolves.toBe(1);

    expect(errors).toEqual(['[inventory-check] catalog failed: Catalog API error: 503 unavailable']);
    expect(logs).toEqual(['[inventory-check] Starting']);
    expect(db.rows).toEqual([]);
    expect(db.end).toHaveBeenCalledTimes(1);
  });

  it('reports an unexpected error and exits 1', async () => {
    deps.createPool = () => {
      throw new Error('boom');
    };

    await expect(main([], env, deps)).resolves.toBe(1);

    expect(errors[0]).toMatch(/^\[inventory-check\] Error: Error: boom/);
  });
});
