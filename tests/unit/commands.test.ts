import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { RetrievalClient } from '../../src/client.js';
import { DEFAULT_CONFIG } from '../../src/config.js';
import type { CommandContext } from '../../src/commands/context.js';
import { runIndex } from '../../src/commands/index-project.js';
import { execute, formatCliError } from '../../src/commands/report.js';
import { parseSearchMode, runSearch } from '../../src/commands/search.js';
import { runServer } from '../../src/commands/server.js';
import { runDelete, runPatterns, runStats } from '../../src/commands/stats.js';
import {
  ConfigurationError,
  RetrievalError,
  ServiceUnavailableError,
} from '../../src/errors.js';
import { silentLogger } from '../../src/logger.js';
import type { CommandResult, CommandRunner } from '../../src/tools/run.js';

interface ApiBehaviour {
  healthStatus?: number;
  uploadStatus?: number;
  deleteStatus?: number;
  searchResults?: unknown;
}

const jsonResponse = (body: unknown, status = 200) =>
  new Response(JSON.stringify(body), { status, headers: { 'content-type': 'application/json' } });

function fakeApi(behaviour: ApiBehaviour = {}) {
  return vi.fn<Parameters<typeof fetch>, ReturnType<typeof fetch>>(async (input) => {
    const url = new URL(String(input));
    switch (url.pathname) {
      case '/health':
        return jsonResponse({ status: 'UP' }, behaviour.healthStatus ?? 200);
      case '/documents':
        return new Response(null, { status: behaviour.uploadStatus ?? 201 });
      case '/search':
        return jsonResponse(behaviour.searchResults ?? []);
      case '/projects/proj/stats':
        return jsonResponse({ documents: 2 });
      case '/projects/proj':
        return new Response(null, { status: behaviour.deleteStatus ?? 204 });
      default:
        return new Response('not found', { status: 404 });
    }
  });
}

function createTestContext(fetchImpl: ReturnType<typeof fakeApi>, json = false) {
  const printed: string[] = [];
  const ctx: CommandContext = {
    config: { ...DEFAULT_CONFIG, projectId: 'proj' },
    logger: silentLogger,
    client: new RetrievalClient({ apiUrl: 'http://rag.test', projectId: 'proj', fetchImpl }),
    json,
    print: (text) => printed.push(text),
  };
  return { ctx, printed };
}

describe('runIndex', () => {
  let root: string;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'corpus-cmd-'));
    await fs.mkdir(path.join(root, 'src'));
    await fs.writeFile(path.join(root, 'src', 'a.py'), 'x = 1\n');
    await fs.writeFile(path.join(root, 'README.md'), '# Readme\n');
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it('should index the project and report success', async () => {
    const fetchImpl = fakeApi();
    const { ctx, printed } = createTestContext(fetchImpl);

    expect(await runIndex(ctx, { path: root, recursive: true })).toBe(true);

    expect(printed[0]).toBe(`→ Indexing project: ${root}`);
    expect(printed[1]).toBe('✓ Successfully indexed 2/2 files');
    expect(printed).toContain('  • code: 1');
    expect(printed).toContain('  • documentation: 1');
    expect(printed[printed.length - 1]).toBe('✓ Ready for search!');
  });

  it('should fail when every upload fails', async () => {
    const { ctx, printed } = createTestContext(fakeApi({ uploadStatus: 500 }));

    expect(await runIndex(ctx, { path: root, recursive: true })).toBe(false);
    expect(printed[1]).toBe('✗ Failed to index 2/2 files');
    expect(printed[printed.length - 1]).toBe('Run with --verbose to list failed files');
  });

  it('should print stats as JSON', async () => {
    const { ctx, printed } = createTestContext(fakeApi(), true);

    await runIndex(ctx, { path: root, recursive: false });

    expect(printed).toHaveLength(1);
    expect(JSON.parse(printed[0])).toMatchObject({ totalFiles: 1, successful: 1, failed: 0 });
  });

  it('should succeed with a hint when nothing is selected', async () => {
    const { ctx, printed } = createTestContext(fakeApi());

    const ok = await runIndex(ctx, {
      path: root,
      recursive: true,
      includeCode: false,
      includeDocs: false,
    });

    expect(ok).toBe(true);
    expect(printed.slice(1)).toEqual([
      '⚠ No files found to index',
      'ℹ Try adjusting --include-* flags or check project path',
    ]);
  });

  it('should index a single file', async () => {
    const fetchImpl = fakeApi();
    const { ctx, printed } = createTestContext(fetchImpl);
    const file = path.join(root, 'README.md');

    expect(await runIndex(ctx, { path: '.', file, recursive: true })).toBe(true);
    expect(printed).toEqual([`✓ Indexed ${file}`]);
  });

  it('should refuse to index against an unhealthy service', async () => {
    const { ctx } = createTestContext(fakeApi({ healthStatus: 503 }));

    await expect(runIndex(ctx, { path: root, recursive: true })).rejects.toBeInstanceOf(
      ServiceUnavailableError,
    );
  });
});

describe('runSearch', () => {
  const hit = [
    { page_content: 'def login(): ...', metadata: { source: 'auth.py', file_type: 'code' } },
    0.5,
  ];

  it('should print formatted results', async () => {
    const { ctx, printed } = createTestContext(fakeApi({ searchResults: [hit] }));

    expect(await runSearch(ctx, 'login', { limit: 5 })).toBe(true);
    expect(printed).toEqual([
      "→ Searching for: 'login'",
      '✓ Found 1 results:',
      '',
      [
        '📄 Result 1: auth.py',
        '   Relevance: 0.500 [█████░░░░░]',
        '   Type: code',
        '   Content: def login(): ...',
      ].join('\n'),
    ]);
  });

  it('should return false when nothing matches', async () => {
    const { ctx, printed } = createTestContext(fakeApi());

    expect(await runSearch(ctx, 'nothing', { limit: 5 })).toBe(false);
    expect(printed[1]).toBe('⚠ No results found');
  });

  it('should send --hybrid as semantic with the limit and filters', async () => {
    const fetchImpl = fakeApi();
    const { ctx } = createTestContext(fetchImpl, true);

    await runSearch(ctx, 'q', { limit: 2, hybrid: true, languages: ['python'] });

    const [, init] = fetchImpl.mock.calls[1];
    expect(JSON.parse(String(init?.body))).toEqual({
      query: 'q',
      project_id: 'proj',
      limit: 2,
      mode: 'semantic',
      languages: ['python'],
    });
  });

  it('should stop before searching when the service is down', async () => {
    const fetchImpl = fakeApi({ healthStatus: 503 });
    const { ctx } = createTestContext(fetchImpl);

    await expect(runSearch(ctx, 'q', { limit: 5 })).rejects.toBeInstanceOf(
      ServiceUnavailableError,
    );
    expect(fetchImpl).toHaveBeenCalledTimes(1);
  });

  it('should reject unknown modes', () => {
    expect(parseSearchMode('keyword')).toBe('keyword');
    expect(() => parseSearchMode('fuzzy')).toThrow(ConfigurationError);
  });
});

describe('runStats', () => {
  it('should print project stats', async () => {
    const { ctx, printed } = createTestContext(fakeApi(), true);

    expect(await runStats(ctx)).toBe(true);
    expect(JSON.parse(printed[0])).toEqual({ documents: 2 });
  });
});

describe('runPatterns', () => {
  it('should search for the pattern type and print each pattern', async () => {
    const hit = [{ page_content: 'Ports and adapters', metadata: { source: 'ARCH.md' } }, 0.8];
    const fetchImpl = fakeApi({ searchResults: [hit] });
    const { ctx, printed } = createTestContext(fetchImpl);

    expect(await runPatterns(ctx, 'architectural', 3)).toBe(true);

    const [, init] = fetchImpl.mock.calls[0];
    expect(JSON.parse(String(init?.body))).toMatchObject({
      query: 'architectural patterns',
      limit: 3,
    });
    expect(printed).toEqual(['🧩 Pattern 1 (architectural): ARCH.md\n   Ports and adapters']);
  });

  it('should return false when no pattern is found', async () => {
    const { ctx, printed } = createTestContext(fakeApi());

    expect(await runPatterns(ctx, 'testing', 10)).toBe(false);
    expect(printed).toEqual(['⚠ No patterns found']);
  });
});

describe('runDelete', () => {
  it('should refuse to delete without confirmation', async () => {
    const fetchImpl = fakeApi();
    const { ctx, printed } = createTestContext(fetchImpl);

    expect(await runDelete(ctx, {})).toBe(false);
    expect(fetchImpl).not.toHaveBeenCalled();
    expect(printed).toEqual([
      "⚠ This deletes every document of project 'proj'. Re-run with --yes",
    ]);
  });

  it('should delete the configured project', async () => {
    const fetchImpl = fakeApi();
    const { ctx, printed } = createTestContext(fetchImpl);

    expect(await runDelete(ctx, { yes: true })).toBe(true);

    const [input, init] = fetchImpl.mock.calls[0];
    expect(String(input)).toBe('http://rag.test/projects/proj');
    expect(init?.method).toBe('DELETE');
    expect(printed).toEqual(['✓ Deleted project proj']);
  });

  it('should report a failed deletion as JSON', async () => {
    const { ctx, printed } = createTestContext(fakeApi({ deleteStatus: 500 }), true);

    expect(await runDelete(ctx, { yes: true })).toBe(false);
    expect(printed).toEqual(['{"projectId":"proj","deleted":false}']);
  });
});

describe('runServer', () => {
  let dockerDir: string;

  beforeEach(async () => {
    dockerDir = await fs.mkdtemp(path.join(os.tmpdir(), 'corpus-server-'));
    await fs.writeFile(path.join(dockerDir, 'docker-compose.local.yml'), 'services: {}\n');
  });

  afterEach(async () => {
    await fs.rm(dockerDir, { recursive: true, force: true });
  });

  function overrides(outputs: Record<string, CommandResult> = {}) {
    const runner = vi.fn<Parameters<CommandRunner>, ReturnType<CommandRunner>>(
      async (command) => outputs[command.join(' ')] ?? { code: 0, stdout: '', stderr: '' },
    );
    return { runner, fetchImpl: fakeApi(), sleep: async () => {}, env: {}, startRetries: 2 };
  }

  it('should start services and print the API URL', async () => {
    const { ctx, printed } = createTestContext(fakeApi());

    expect(await runServer(ctx, 'start', { dockerDir, tail: 100 }, overrides())).toBe(true);
    expect(printed).toEqual(['✓ Server started successfully!', 'API URL: http://rag.test']);
  });

  it('should run the profile setup script, then wait for health', async () => {
    await fs.writeFile(path.join(dockerDir, 'setup-local.sh'), 'exit 0\n');
    const { ctx, printed } = createTestContext(fakeApi());
    const deps = overrides();

    expect(await runServer(ctx, 'setup', { dockerDir, tail: 100 }, deps)).toBe(true);
    expect(deps.runner).toHaveBeenCalledWith(['bash', 'setup-local.sh'], { cwd: dockerDir });
    expect(printed).toEqual(['✓ Server setup completed', 'API URL: http://rag.test']);
  });

  it('should report a stop as JSON', async () => {
    const { ctx, printed } = createTestContext(fakeApi(), true);

    await runServer(ctx, 'stop', { dockerDir, tail: 100 }, overrides());
    expect(printed).toEqual(['{"action":"stop","success":true}']);
  });

  it('should report status as JSON', async () => {
    const { ctx, printed } = createTestContext(fakeApi(), true);

    await runServer(ctx, 'status', { dockerDir, tail: 100 }, overrides());

    expect(JSON.parse(printed[0])).toEqual({
      deployment: 'local',
      services: {},
      health: { ragApi: true, database: true, embeddings: false },
      ports: { ragApi: 8000, database: 5432, embeddings: 11434 },
    });
  });

  it('should print health and return it', async () => {
    const { ctx, printed } = createTestContext(fakeApi({ healthStatus: 503 }));

    expect(await runServer(ctx, 'health', { dockerDir, tail: 100 }, overrides())).toBe(false);
    expect(printed).toEqual(['🔴 Unhealthy']);
  });

  it('should print service logs', async () => {
    const { ctx, printed } = createTestContext(fakeApi());
    const outputs = {
      'docker compose -f docker-compose.local.yml logs --tail 20 rag_api': {
        code: 0,
        stdout: 'ready\n',
        stderr: '',
      },
    };

    await runServer(ctx, 'logs', { dockerDir, service: 'rag_api', tail: 20 }, overrides(outputs));
    expect(printed).toEqual(['ready\n']);
  });

  it('should reject unknown actions and profiles', async () => {
    const { ctx } = createTestContext(fakeApi());

    await expect(runServer(ctx, 'reboot', { dockerDir, tail: 100 })).rejects.toThrow(
      'Unknown server action: reboot',
    );
    await expect(
      runServer(ctx, 'status', { dockerDir, deployment: 'cloud', tail: 100 }),
    ).rejects.toBeInstanceOf(ConfigurationError);
  });
});

describe('error reporting', () => {
  afterEach(() => {
    process.exitCode = undefined;
  });

  it('should suggest starting the server when it is unreachable', () => {
    expect(formatCliError(new ServiceUnavailableError('http://rag.test'))).toEqual([
      'Error: RAG server is not accessible at http://rag.test',
      'Run: corpus server start',
    ]);
  });

  it('should include internal details', () => {
    expect(formatCliError(new RetrievalError('Request failed', 500, 'index missing'))).toEqual([
      'Error: Request failed',
      'Details: index missing',
    ]);
  });

  it('should mark errors from outside the toolkit as unexpected', () => {
    expect(formatCliError(new Error('boom'))).toEqual(['Unexpected error: boom']);
  });

  it('should map the task result to an exit code', async () => {
    const printError = vi.fn();

    expect(await execute(async () => true, printError)).toBe(0);
    expect(await execute(() => false, printError)).toBe(1);
    expect(
      await execute(() => {
        throw new ConfigurationError('Bad flag');
      }, printError),
    ).toBe(1);
    expect(process.exitCode).toBe(1);
    expect(printError).toHaveBeenCalledWith('Error: Bad flag');
  });
});
