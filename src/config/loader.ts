/**
 * Hosts override file handle with recursive import resolution.
 *
 * @module config/loader
 */

import fs, { type FileHandle } from 'node:fs/promises';
import path from 'node:path';
import { ConfigurationError, ImportCycleError, InvalidRecordError } from '../errors.js';
import { HostMatcher } from '../filter/host-matcher.js';
import { createChildLogger, type Logger } from '../logging/logger.js';
import type { ConfigOptions, ParseResult } from '../types/config.js';
import { isIpAddress } from './address.js';
import { describeInvalidKind } from './diagnostics.js';
import { parseDocument } from './parser.js';

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

const utf8 = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });

/**
 * Read a whole file through its handle, regardless of the handle's position.
 *
 * @throws TypeError if the content is not valid UTF-8
 */
async function readAll(handle: FileHandle): Promise<string> {
  const { size } = await handle.stat();
  const buffer = Buffer.alloc(size);
  let offset = 0;
  while (offset < size) {
    const { bytesRead } = await handle.read(buffer, offset, size - offset, offset);
    if (bytesRead === 0) break;
    offset += bytesRead;
  }
  return utf8.decode(buffer.subarray(0, offset));
}

/**
 * An open hosts override file.
 *
 * The file is opened for reading and appending, and is created along with
 * its parent directories if it does not exist. `parse` consumes the handle;
 * `add` and `parse` on the same instance must not overlap.
 *
 * @example
 * ```typescript
 * const config = await Config.open('./hosts.conf');
 * await config.add('*.example.com', '10.0.0.2');
 * const result = await config.parse();
 *
 * result.hosts.lookup('api.example.com'); // '10.0.0.2'
 * ```
 */
export class Config {
  private handle?: FileHandle;
  private readonly logger?: Logger;

  private constructor(
    readonly filePath: string,
    handle: FileHandle,
    private readonly options: ConfigOptions,
    private readonly chain: readonly string[]
  ) {
    this.handle = handle;
    this.logger = options.logger
      ? createChildLogger(options.logger, { file: filePath })
      : undefined;
  }

  /**
   * Open a configuration file, creating it if needed.
   *
   * @param filePath - Path to the file
   * @param options - Logger and cycle detection settings
   * @throws ConfigurationError if the directory or file cannot be created or opened
   */
  static async open(filePath: string, options: ConfigOptions = {}): Promise<Config> {
    return Config.openInChain(filePath, options, []);
  }

  private static async openInChain(
    filePath: string,
    options: ConfigOptions,
    chain: readonly string[]
  ): Promise<Config> {
    const resolved = path.resolve(filePath);

    try {
      await fs.mkdir(path.dirname(resolved), { recursive: true });
    } catch (error) {
      throw new ConfigurationError(
        `Failed to create directory for configuration file: ${describeError(error)}`,
        resolved,
        error
      );
    }

    let handle: FileHandle;
    try {
      handle = await fs.open(resolved, 'a+');
    } catch (error) {
      throw new ConfigurationError(
        `Failed to open configuration file: ${describeError(error)}`,
        resolved,
        error
      );
    }

    options.logger?.debug({ path: resolved }, 'Opened hosts configuration');
    return new Config(resolved, handle, options, [...chain, resolved]);
  }

  /**
   * Append a host record to the file.
   *
   * A newline is written first unless the file already ends with one, so an
   * empty file gets a blank first line.
   *
   * @param pattern - Domain pattern (literal, wildcard or regular expression)
   * @param address - IP address the pattern resolves to
   * @returns Number of bytes written
   * @throws InvalidRecordError if the record would not parse back
   * @throws ConfigurationError if the file cannot be read or written
   */
  async add(pattern: string, address: string): Promise<number> {
    const handle = this.requireHandle();

    if (!isIpAddress(address)) {
      throw new InvalidRecordError('IpAddr', pattern, address);
    }
    // Whitespace or a comment marker would change how the line splits.
    if (pattern === '' || /[\s#]/.test(pattern)) {
      throw new InvalidRecordError('Other', pattern, address);
    }
    if (!HostMatcher.compile(pattern).ok) {
      throw new InvalidRecordError('Regex', pattern, address);
    }

    try {
      const content = await readAll(handle);
      const prefix = content.endsWith('\n') ? '' : '\n';
      const { bytesWritten } = await handle.write(`${prefix}${pattern}  ${address}`);
      this.logger?.debug({ pattern, address }, 'Added host record');
      return bytesWritten;
    } catch (error) {
      throw new ConfigurationError(
        `Failed to append to configuration file: ${describeError(error)}`,
        this.filePath,
        error
      );
    }
  }

  /**
   * Parse the file and everything it imports.
   *
   * The handle is closed afterwards and the instance cannot be used again.
   *
   * @throws ConfigurationError if any file in the import tree cannot be opened or read
   * @throws ImportCycleError if cycle detection is on and an import leads back to
   *   a file that is still being parsed
   */
  async parse(): Promise<ParseResult> {
    const handle = this.requireHandle();
    this.handle = undefined;

    const text = await this.readAndClose(handle);
    const result = await parseDocument(text, {
      resolveImport: (target, line) => this.resolveImport(target, line),
      onInvalid: (invalid) => {
        this.logger?.warn(
          { line: invalid.line, kind: invalid.kind, source: invalid.source },
          describeInvalidKind(invalid.kind)
        );
      },
    });

    this.logger?.debug(
      { hosts: result.hosts.size, invalid: result.invalid.length },
      'Parsed hosts configuration'
    );
    return result;
  }

  /**
   * Close the handle without parsing. Safe to call more than once.
   */
  async close(): Promise<void> {
    const handle = this.handle;
    this.handle = undefined;
    await handle?.close();
  }

  /**
   * Read the file and release its handle. A close failure after a failed read
   * is logged so that the read error is the one reported.
   */
  private async readAndClose(handle: FileHandle): Promise<string> {
    let text: string;
    try {
      text = await readAll(handle);
    } catch (error) {
      await handle.close().catch((closeError: unknown) => {
        this.logger?.warn({ error: closeError }, 'Failed to close configuration file');
      });
      throw new ConfigurationError(
        `Failed to read configuration file: ${describeError(error)}`,
        this.filePath,
        error
      );
    }

    try {
      await handle.close();
    } catch (error) {
      throw new ConfigurationError(
        `Failed to close configuration file: ${describeError(error)}`,
        this.filePath,
        error
      );
    }
    return text;
  }

  private async resolveImport(target: string, line: number): Promise<ParseResult> {
    const resolved = path.resolve(path.dirname(this.filePath), target);

    if ((this.options.detectCycles ?? true) && this.chain.includes(resolved)) {
      throw new ImportCycleError([...this.chain, resolved]);
    }

    this.logger?.debug({ line, import: resolved }, 'Following import');
    const imported = await Config.openInChain(resolved, this.options, this.chain);
    return imported.parse();
  }

  private requireHandle(): FileHandle {
    if (!this.handle) {
      throw new ConfigurationError(
        'Configuration handle has been closed or consumed by parse()',
        this.filePath,
        undefined,
        'CONFIG_CONSUMED'
      );
    }
    return this.handle;
  }
}

/**
 * Open a configuration file and parse it.
 *
 * @example
 * ```typescript
 * const result = await loadHostsConfig('/etc/resolver/hosts.conf', { logger });
 * for (const invalid of result.invalid) {
 *   logger.warn(formatInvalid(invalid));
 * }
 * ```
 */
export async function loadHostsConfig(
  filePath: string,
  options: ConfigOptions = {}
): Promise<ParseResult> {
  const config = await Config.open(filePath, options);
  return config.parse();
}
