import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'node:fs';
import fsp, { type FileHandle } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import pino from 'pino';
import { Config, loadHostsConfig } from '../src/config/loader.js';
import { ConfigurationError, ImportCycleError, InvalidRecordError } from '../src/errors.js';

describe('Config', () => {
  let testDir: string;

  function write(name: string, content: string): string {
    const filePath = path.join(testDir, name);
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, content);
    return filePath;
  }

  function read(name: string): string {
    return fs.readFileSync(path.join(testDir, name), 'utf-8');
  }

  beforeEach(() => {
    testDir = fs.mkdtempSync(path.join(os.tmpdir(), 'hosts-override-'));
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(testDir, { recursive: true, force: true });
  });

  /** Make the next opened handle fail its first close. */
  function failNextClose(): FileHandle[] {
    const handles: FileHandle[] = [];
    const originalOpen = fsp.open;
    vi.spyOn(fsp, 'open').mockImplementationOnce(async (file, flags, mode) => {
      const handle = await originalOpen(file, flags, mode);
      vi.spyOn(handle, 'close').mockRejectedValueOnce(new Error('EIO: i/o error, close'));
      handles.push(handle);
      return handle;
    });
    return handles;
  }

  describe('open', () => {
    it('should create missing directories and the file', async () => {
      const filePath = path.join(testDir, 'nested', 'dir', 'hosts.conf');

      const config = await Config.open(filePath);
      await config.close();

      expect(fs.existsSync(filePath)).toBe(true);
      expect(read('nested/dir/hosts.conf')).toBe('');
    });

    it('should fail when the parent path is a file', async () => {
      write('blocker', 'not a directory');

      await expect(Config.open(path.join(testDir, 'blocker', 'hosts.conf'))).rejects.toBeInstanceOf(
        ConfigurationError
      );
    });
  });

  describe('parse', () => {
    it('should parse a file with an import', async () => {
      write('extra.conf', 'proxy 8.8.8.8:53\n*.internal 192.168.0.10\n');
      const filePath = write(
        'hosts.conf',
        [
          '# comment line, ignored',
          'bind 0.0.0.0:53',
          'proxy 1.2.3.4:53',
          'timeout 30',
          'import ./extra.conf',
          'example.com 10.0.0.1',
          '10.0.0.2 *.example.com',
          '^api\\.example\\.(com|org)$ 10.0.0.3',
          '',
        ].join('\n')
      );

      const result = await (await Config.open(filePath)).parse();

      expect(result.bind).toEqual([{ ip: '0.0.0.0', port: 53, family: 4 }]);
      expect(result.proxy).toEqual([
        { ip: '1.2.3.4', port: 53, family: 4 },
        { ip: '8.8.8.8', port: 53, family: 4 },
      ]);
      expect(result.timeout).toBe(30n);
      expect(result.invalid).toEqual([]);
      expect(result.hosts.size).toBe(4);
      expect(result.hosts.lookup('db.internal')).toBe('192.168.0.10');
      expect(result.hosts.lookup('example.com')).toBe('10.0.0.1');
      expect(result.hosts.lookup('www.example.com')).toBe('10.0.0.2');
      expect(result.hosts.lookup('api.example.org')).toBe('10.0.0.3');
    });

    it('should merge an import before the lines that follow it', async () => {
      write('b.conf', 'b.example 10.0.0.2\ntimeout 20\n');
      const filePath = write(
        'a.conf',
        ['a.example 10.0.0.1', 'timeout 10', 'import b.conf', 'c.example 10.0.0.3', 'oops'].join('\n')
      );

      const result = await loadHostsConfig(filePath);

      expect([...result.hosts].map(([, address]) => address)).toEqual([
        '10.0.0.1',
        '10.0.0.2',
        '10.0.0.3',
      ]);
      expect(result.timeout).toBe(20n);
      expect(result.invalid).toEqual([{ line: 5, source: 'oops', kind: 'Other' }]);
    });

    it('should resolve nested imports against their own directory', async () => {
      write('two.conf', 'deep.example 10.0.0.1\n');
      write('sub/two.conf', 'deep.example 10.0.0.9\n');
      write('sub/one.conf', 'import two.conf\n');
      const filePath = write('root.conf', 'import sub/one.conf\n');

      const result = await loadHostsConfig(filePath);

      expect(result.hosts.size).toBe(1);
      expect(result.hosts.lookup('deep.example')).toBe('10.0.0.9');
    });

    it('should keep line numbers local to each file', async () => {
      write('child.conf', '\n\nbad-child\n');
      const filePath = write('parent.conf', 'bad-parent\nimport child.conf\n');

      const result = await loadHostsConfig(filePath);

      expect(result.invalid).toEqual([
        { line: 1, source: 'bad-parent', kind: 'Other' },
        { line: 3, source: 'bad-child', kind: 'Other' },
      ]);
    });

    it('should create a missing imported file', async () => {
      const filePath = write('hosts.conf', 'import more/extra.conf\n');

      const result = await loadHostsConfig(filePath);

      expect(fs.existsSync(path.join(testDir, 'more', 'extra.conf'))).toBe(true);
      expect(result.hosts.size).toBe(0);
      expect(result.invalid).toEqual([]);
    });

    it('should allow the same file to be imported twice', async () => {
      write('shared.conf', 'shared.example 10.0.0.5\n');
      const filePath = write('hosts.conf', 'import shared.conf\nimport shared.conf\n');

      const result = await loadHostsConfig(filePath);

      expect(result.hosts.size).toBe(2);
    });

    it('should reject import cycles', async () => {
      const a = write('a.conf', 'a.example 10.0.0.1\nimport b.conf\n');
      const b = write('b.conf', 'import a.conf\n');

      const error = await loadHostsConfig(a).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(ImportCycleError);
      expect(error).toMatchObject({ code: 'IMPORT_CYCLE', chain: [a, b, a] });
    });

    it('should reject a file that imports itself', async () => {
      const filePath = write('self.conf', 'import self.conf\n');

      await expect(loadHostsConfig(filePath)).rejects.toBeInstanceOf(ImportCycleError);
    });

    it('should fail the whole parse when an import cannot be opened', async () => {
      write('blocker', 'not a directory');
      const filePath = write('hosts.conf', 'example.com 10.0.0.1\nimport blocker/extra.conf\n');

      await expect(loadHostsConfig(filePath)).rejects.toBeInstanceOf(ConfigurationError);
    });

    it('should not allow parsing twice', async () => {
      const config = await Config.open(write('hosts.conf', 'example.com 10.0.0.1\n'));
      await config.parse();

      await expect(config.parse()).rejects.toMatchObject({ code: 'CONFIG_CONSUMED' });
      await expect(config.add('b.example', '10.0.0.2')).rejects.toBeInstanceOf(ConfigurationError);
    });

    it('should reject a file that is not valid UTF-8', async () => {
      const filePath = path.join(testDir, 'hosts.conf');
      fs.writeFileSync(
        filePath,
        Buffer.from([0x61, 0xff, 0x2e, 0x63, 0x20, 0x31, 0x2e, 0x32, 0x2e, 0x33, 0x2e, 0x34, 0x0a])
      );

      const error = await loadHostsConfig(filePath).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(ConfigurationError);
      expect(error).toMatchObject({
        path: filePath,
        message: expect.stringMatching(/^Failed to read configuration file: /),
      });
    });

    it('should report a failure to close the file', async () => {
      const filePath = write('hosts.conf', 'example.com 10.0.0.1\n');
      const handles = failNextClose();

      const error = await loadHostsConfig(filePath).catch((err: unknown) => err);
      await Promise.all(handles.map((handle) => handle.close()));

      expect(error).toBeInstanceOf(ConfigurationError);
      expect(error).toMatchObject({
        path: filePath,
        message: 'Failed to close configuration file: EIO: i/o error, close',
      });
    });

    it('should keep the read error when closing also fails', async () => {
      const lines: string[] = [];
      const logger = pino({ level: 'warn' }, { write: (line: string) => lines.push(line) });
      const filePath = path.join(testDir, 'hosts.conf');
      fs.writeFileSync(filePath, Buffer.from([0xc3, 0x28, 0x0a]));
      const handles = failNextClose();

      const error = await loadHostsConfig(filePath, { logger }).catch((err: unknown) => err);
      await Promise.all(handles.map((handle) => handle.close()));

      expect(error).toBeInstanceOf(ConfigurationError);
      expect(error).toMatchObject({
        path: filePath,
        message: expect.stringMatching(/^Failed to read configuration file: /),
      });
      expect(lines).toHaveLength(1);
      expect(JSON.parse(lines[0])).toMatchObject({
        level: 40,
        file: filePath,
        msg: 'Failed to close configuration file',
      });
    });

    it('should log invalid lines with their file', async () => {
      const lines: string[] = [];
      const logger = pino({ level: 'warn' }, { write: (line: string) => lines.push(line) });
      const filePath = write('hosts.conf', 'example.com 10.0.0.1\nfoo bar\n');

      await loadHostsConfig(filePath, { logger });

      expect(lines).toHaveLength(1);
      expect(JSON.parse(lines[0])).toMatchObject({
        level: 40,
        file: filePath,
        line: 2,
        kind: 'IpAddr',
        source: 'foo bar',
        msg: 'Cannot parse ip address',
      });
    });
  });

  describe('add', () => {
    it('should write a newline first when the file lacks one', async () => {
      write('hosts.conf', 'a.example 10.0.0.1');
      const config = await Config.open(path.join(testDir, 'hosts.conf'));

      const written = await config.add('b.example', '10.0.0.2');
      await config.close();

      expect(written).toBe(20);
      expect(read('hosts.conf')).toBe('a.example 10.0.0.1\nb.example  10.0.0.2');
    });

    it('should not add a newline when the file ends with one', async () => {
      write('hosts.conf', 'a.example 10.0.0.1\n');
      const config = await Config.open(path.join(testDir, 'hosts.conf'));

      await config.add('b.example', '10.0.0.2');
      await config.close();

      expect(read('hosts.conf')).toBe('a.example 10.0.0.1\nb.example  10.0.0.2');
    });

    it('should start an empty file with a newline', async () => {
      const config = await Config.open(path.join(testDir, 'hosts.conf'));

      const written = await config.add('*.example.com', '::1');
      await config.close();

      expect(written).toBe(19);
      expect(read('hosts.conf')).toBe('\n*.example.com  ::1');
    });

    it('should refuse to append to a file that is not valid UTF-8', async () => {
      const filePath = path.join(testDir, 'hosts.conf');
      fs.writeFileSync(filePath, Buffer.from([0x61, 0xff, 0x0a]));
      const config = await Config.open(filePath);

      await expect(config.add('b.example', '10.0.0.2')).rejects.toBeInstanceOf(ConfigurationError);
      await config.close();

      expect(fs.readFileSync(filePath)).toEqual(Buffer.from([0x61, 0xff, 0x0a]));
    });

    it('should write records that parse back', async () => {
      const config = await Config.open(path.join(testDir, 'hosts.conf'));

      await config.add('a.example', '10.0.0.1');
      await config.add('^b\\.example$', '10.0.0.2');
      const result = await config.parse();

      expect(result.invalid).toEqual([]);
      expect(result.hosts.lookup('a.example')).toBe('10.0.0.1');
      expect(result.hosts.lookup('b.example')).toBe('10.0.0.2');
    });

    it('should refuse records that would not parse', async () => {
      const config = await Config.open(path.join(testDir, 'hosts.conf'));

      await expect(config.add('example.com', 'nowhere')).rejects.toMatchObject({ kind: 'IpAddr' });
      await expect(config.add('(abc', '10.0.0.1')).rejects.toMatchObject({ kind: 'Regex' });
      await expect(config.add('a b', '10.0.0.1')).rejects.toBeInstanceOf(InvalidRecordError);
      await config.close();

      expect(read('hosts.conf')).toBe('');
    });
  });
});
