/**
 * Docker Compose Runtime Tests
 */
import { existsSync } from 'node:fs';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { parse as parseYaml } from 'yaml';
import { RuntimeCommandError, ValidationError, type CommandResult } from '@rewind/shared';
import type { RunOptions } from './command-runner.js';
import { ComposeRuntime, parsePsOutput } from './compose-runtime.js';

const ok = (stdout = ''): CommandResult => ({ exitCode: 0, stdout, stderr: '' });
const fail = (stderr: string, exitCode = 1): CommandResult => ({ exitCode, stdout: '', stderr });

describe('parsePsOutput', () => {
  it('should read a JSON array', () => {
    const stdout = JSON.stringify([
      { Service: 'api', Image: 'shop/api:1.4.0', State: 'running' },
      { Service: 'cache', Image: 'redis:7' },
    ]);

    expect(parsePsOutput(stdout)).toEqual([
      { Service: 'api', Image: 'shop/api:1.4.0', State: 'running' },
      { Service: 'cache', Image: 'redis:7' },
    ]);
  });

  it('should read one JSON object per line', () => {
    const stdout = '{"Service":"api","Image":"shop/api:1.4.0"}\n{"Service":"cache","Image":"redis:7"}\n';

    expect(parsePsOutput(stdout).map((entry) => entry.Service)).toEqual(['api', 'cache']);
  });

  it('should skip entries without a service or image', () => {
    expect(parsePsOutput('{"Name":"orphan"}\n{"Service":"api","Image":"a:1"}')).toEqual([
      { Service: 'api', Image: 'a:1' },
    ]);
  });

  it('should return nothing for empty output', () => {
    expect(parsePsOutput('  \n')).toEqual([]);
  });
});

describe('ComposeRuntime', () => {
  let projectRoot: string;
  let routes: Array<[string, CommandResult]>;

  // Replies with the first route whose key appears in the joined args
  const createRunner = () =>
    vi.fn(async (_command: string, args: string[], _options: RunOptions): Promise<CommandResult> => {
      const line = args.join(' ');
      const route = routes.find(([key]) => line.includes(key));
      return route ? route[1] : ok();
    });

  let runner: ReturnType<typeof createRunner>;

  const composeArgs = (...args: string[]) => ['compose', '-f', join(projectRoot, 'docker-compose.yml'), ...args];

  beforeEach(async () => {
    projectRoot = await mkdtemp(join(tmpdir(), 'rewind-compose-'));
    routes = [];
    runner = createRunner();
  });

  afterEach(async () => {
    await rm(projectRoot, { recursive: true, force: true });
  });

  const createRuntime = (config: { projectName?: string } = {}) =>
    new ComposeRuntime({ projectRoot, timeoutMs: 2000, ...config }, runner);

  describe('services', () => {
    it('should list services defined by the compose files', async () => {
      routes.push(['config --services', ok('api\ncache\n\n')]);

      await expect(createRuntime().listServices()).resolves.toEqual(['api', 'cache']);
      expect(runner).toHaveBeenCalledWith('docker', composeArgs('config', '--services'), {
        cwd: projectRoot,
        timeoutMs: 2000,
      });
    });

    it('should pass the project name after the compose files', async () => {
      await createRuntime({ projectName: 'shop' }).stop('api');

      expect(runner).toHaveBeenCalledWith(
        'docker',
        ['compose', '-f', join(projectRoot, 'docker-compose.yml'), '-p', 'shop', 'stop', 'api'],
        expect.anything()
      );
    });

    it('should reject an invalid project name', () => {
      expect(() => createRuntime({ projectName: '-bad name' })).toThrow(ValidationError);
    });

    it('should raise a runtime error when listing fails', async () => {
      routes.push(['config --services', fail('no configuration file provided')]);

      const listing = createRuntime().listServices();

      await expect(listing).rejects.toBeInstanceOf(RuntimeCommandError);
      await expect(listing).rejects.toThrow('docker failed to list services: no configuration file provided');
    });

    it('should report the image of a service container', async () => {
      routes.push(['ps --format json', ok('{"Service":"api","Image":"shop/api:1.4.0","State":"running"}\n')]);

      await expect(createRuntime().getImage('api')).resolves.toBe('shop/api:1.4.0');
    });

    it('should raise when a service has no container', async () => {
      routes.push(['ps --format json', ok('[]')]);

      await expect(createRuntime().getImage('api')).rejects.toThrow("Service 'api' has no container");
    });

    it('should read the running state from compose ps', async () => {
      routes.push(['ps --status running --services', ok('api\n')]);
      const runtime = createRuntime();

      await expect(runtime.isRunning('api')).resolves.toBe(true);
      await expect(runtime.isRunning('cache')).resolves.toBe(false);
    });

    it('should treat a failing ps as not running', async () => {
      routes.push(['ps --status running', fail('daemon not reachable')]);

      await expect(createRuntime().isRunning('api')).resolves.toBe(false);
    });

    it('should start a single service without its dependencies', async () => {
      await expect(createRuntime().start('api')).resolves.toBe(true);

      expect(runner).toHaveBeenCalledWith('docker', composeArgs('up', '-d', '--no-deps', 'api'), expect.anything());
    });

    it('should report a failed stop as false', async () => {
      routes.push(['stop api', fail('timeout')]);

      await expect(createRuntime().stop('api')).resolves.toBe(false);
    });

    it('should refuse names that are not service names', async () => {
      await expect(createRuntime().stop('api; rm -rf /')).rejects.toBeInstanceOf(ValidationError);
      expect(runner).not.toHaveBeenCalled();
    });
  });

  describe('restoreImage', () => {
    it('should pin a local image in the override file', async () => {
      const runtime = createRuntime();

      await expect(runtime.restoreImage('api', 'shop/api:1.3.0')).resolves.toBe(true);

      expect(runner).toHaveBeenCalledWith(
        'docker',
        ['image', 'inspect', '--format', '{{.Id}}', 'shop/api:1.3.0'],
        expect.anything()
      );
      expect(runner).not.toHaveBeenCalledWith('docker', ['pull', 'shop/api:1.3.0'], expect.anything());
      const override: unknown = parseYaml(await readFile(runtime.overridePath, 'utf8'));
      expect(override).toEqual({ services: { api: { image: 'shop/api:1.3.0' } } });
    });

    it('should layer the override file after the project files once it exists', async () => {
      const runtime = createRuntime();
      await runtime.restoreImage('api', 'shop/api:1.3.0');

      await runtime.start('api');

      expect(runner).toHaveBeenLastCalledWith(
        'docker',
        [
          'compose',
          '-f',
          join(projectRoot, 'docker-compose.yml'),
          '-f',
          join(projectRoot, 'docker-compose.rollback.yml'),
          'up',
          '-d',
          '--no-deps',
          'api',
        ],
        expect.anything()
      );
    });

    it('should keep pins for other services', async () => {
      await writeFile(
        join(projectRoot, 'docker-compose.rollback.yml'),
        'services:\n  cache:\n    image: redis:7.0\n'
      );
      const runtime = createRuntime();

      await runtime.restoreImage('api', 'shop/api:1.3.0');

      const override: unknown = parseYaml(await readFile(runtime.overridePath, 'utf8'));
      expect(override).toEqual({
        services: { cache: { image: 'redis:7.0' }, api: { image: 'shop/api:1.3.0' } },
      });
    });

    it('should pull an image that is not present locally', async () => {
      routes.push(['image inspect', fail('No such image')]);
      const runtime = createRuntime();

      await expect(runtime.restoreImage('api', 'shop/api:1.3.0')).resolves.toBe(true);

      expect(runner).toHaveBeenCalledWith('docker', ['pull', 'shop/api:1.3.0'], expect.anything());
    });

    it('should not pin an image that cannot be pulled', async () => {
      routes.push(['image inspect', fail('No such image')], ['pull', fail('manifest unknown')]);
      const runtime = createRuntime();

      await expect(runtime.restoreImage('api', 'shop/api:1.3.0')).resolves.toBe(false);
      expect(existsSync(runtime.overridePath)).toBe(false);
    });

    it('should reject an invalid image reference', async () => {
      await expect(createRuntime().restoreImage('api', 'img:v1 --privileged')).rejects.toBeInstanceOf(
        ValidationError
      );
    });
  });

  describe('volumes', () => {
    it('should list named volumes mounted by the services containers', async () => {
      routes.push(
        ['ps -q api', ok('c0ffee\n')],
        [
          'inspect --format {{json .Mounts}} c0ffee',
          ok(
            JSON.stringify([
              { Type: 'volume', Name: 'shop_uploads' },
              { Type: 'bind', Source: '/etc/shop' },
              { Type: 'volume', Name: 'shop_pgdata' },
            ])
          ),
        ]
      );

      await expect(createRuntime().listVolumes(['api'])).resolves.toEqual(['shop_pgdata', 'shop_uploads']);
    });

    it('should archive a volume through a helper container', async () => {
      const destination = join(projectRoot, 'backups', 'shop_uploads.tar.gz');

      await expect(createRuntime().exportVolume('shop_uploads', destination)).resolves.toBe(true);

      expect(runner).toHaveBeenCalledWith(
        'docker',
        [
          'run',
          '--rm',
          '-v',
          'shop_uploads:/data:ro',
          '-v',
          `${join(projectRoot, 'backups')}:/backup`,
          'alpine:3.20',
          'tar',
          'czf',
          '/backup/shop_uploads.tar.gz',
          '-C',
          '/data',
          '.',
        ],
        expect.anything()
      );
    });

    it('should clear a volume before extracting its archive', async () => {
      const source = join(projectRoot, 'backups', 'shop_uploads.tar.gz');

      await createRuntime().importVolume('shop_uploads', source);

      expect(runner).toHaveBeenCalledWith(
        'docker',
        [
          'run',
          '--rm',
          '-v',
          'shop_uploads:/data',
          '-v',
          `${join(projectRoot, 'backups')}:/backup:ro`,
          'alpine:3.20',
          'sh',
          '-c',
          'find /data -mindepth 1 -delete && tar xzf /backup/shop_uploads.tar.gz -C /data',
        ],
        expect.anything()
      );
    });
  });

  describe('in-container operations', () => {
    it('should exec without a TTY and return the raw result', async () => {
      routes.push(['exec -T cache redis-cli PING', ok('PONG\n')]);

      await expect(createRuntime().exec('cache', ['redis-cli', 'PING'])).resolves.toEqual(ok('PONG\n'));
    });

    it('should send a signal through compose kill', async () => {
      await expect(createRuntime().signal('prometheus', 'SIGHUP')).resolves.toBe(true);

      expect(runner).toHaveBeenCalledWith(
        'docker',
        composeArgs('kill', '-s', 'SIGHUP', 'prometheus'),
        expect.anything()
      );
    });

    it('should reject a malformed signal', async () => {
      await expect(createRuntime().signal('prometheus', 'HUP; reboot')).rejects.toBeInstanceOf(ValidationError);
    });
  });
});
