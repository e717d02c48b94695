/**
 * Tar.gz Archive Extractor
 * Streams a gzip-compressed tar archive into a directory using Node.js built-in modules.
 *
 * Headers are parsed as 512-byte blocks arrive from gunzip and file bodies are
 * written straight to disk, so memory use does not grow with archive size and
 * at most one output file is open at a time.
 */

import * as fs from 'fs';
import * as path from 'path';
import * as zlib from 'zlib';
import type { Readable } from 'stream';
import { ExtractError, SyncError, errnoCode, toError } from '../errors';

const BLOCK_SIZE = 512;
const DEFAULT_FILE_MODE = 0o644;

export type ArchiveEntryType = 'directory' | 'file';

export interface ArchiveEntry {
  /** Path as recorded in the archive */
  path: string;
  type: ArchiveEntryType;
  size: number;
  mode: number;
}

export interface ExtractSummary {
  directories: number;
  files: number;
  /** Links, devices and other entries that are not written */
  skipped: number;
  /** File content bytes written */
  bytes: number;
}

export interface ExtractOptions {
  /** Called after each directory is created or file is fully written */
  onEntry?: (entry: ArchiveEntry) => void;
}

interface TarHeader {
  name: string;
  mode: number;
  size: number;
  typeflag: string;
}

type EntrySink =
  | { kind: 'file'; entry: ArchiveEntry; handle: fs.promises.FileHandle }
  | { kind: 'meta'; typeflag: string; chunks: Buffer[] }
  | { kind: 'skip' };

interface ActiveEntry {
  name: string;
  remaining: number;
  padding: number;
  done: boolean;
  sink: EntrySink;
}

// =============================================================================
// HEADER PARSING
// =============================================================================

function readString(block: Buffer, offset: number, length: number): string {
  const field = block.subarray(offset, offset + length);
  const nul = field.indexOf(0);
  return field.toString('utf8', 0, nul === -1 ? field.length : nul);
}

/**
 * Parse an octal (or GNU base-256) numeric header field
 */
function readNumber(block: Buffer, offset: number, length: number, field: string): number {
  if (block[offset] & 0x80) {
    let value = 0;
    for (let i = offset + 1; i < offset + length; i++) {
      value = value * 256 + block[i];
    }
    return value;
  }

  const text = readString(block, offset, length).trim();
  if (text === '') return 0;
  if (!/^[0-7]+$/.test(text)) {
    throw new ExtractError(`Malformed ${field} field in tar header: "${text}"`);
  }
  return parseInt(text, 8);
}

function computeChecksum(block: Buffer): number {
  let sum = 0;
  for (let i = 0; i < BLOCK_SIZE; i++) {
    // checksum field itself counts as spaces
    sum += i >= 148 && i < 156 ? 0x20 : block[i];
  }
  return sum;
}

function isZeroBlock(block: Buffer): boolean {
  return block.every((b) => b === 0);
}

function parseHeader(block: Buffer): TarHeader {
  let name = readString(block, 0, 100);

  try {
    const expected = readNumber(block, 148, 8, 'checksum');
    if (computeChecksum(block) !== expected) {
      throw new ExtractError('Invalid tar header checksum');
    }

    // POSIX ustar keeps a path prefix at 345; GNU uses those bytes for timestamps
    if (readString(block, 257, 6) === 'ustar') {
      const prefix = readString(block, 345, 155);
      if (prefix) name = `${prefix}/${name}`;
    }

    return {
      name,
      mode: readNumber(block, 100, 8, 'mode'),
      size: readNumber(block, 124, 12, 'size'),
      typeflag: String.fromCharCode(block[156]),
    };
  } catch (error) {
    if (error instanceof ExtractError && !error.entryName && name) {
      throw new ExtractError(error.message, name);
    }
    throw error;
  }
}

/**
 * Parse pax extended header records ("<len> <key>=<value>\n")
 */
function parsePaxRecords(data: Buffer): Map<string, string> {
  const records = new Map<string, string>();
  let pos = 0;

  while (pos < data.length) {
    const space = data.indexOf(0x20, pos);
    if (space === -1) break;
    const length = parseInt(data.toString('utf8', pos, space), 10);
    if (!Number.isFinite(length) || length <= 0 || pos + length > data.length) {
      throw new ExtractError('Malformed pax extended header');
    }

    const record = data.toString('utf8', space + 1, pos + length - 1);
    const eq = record.indexOf('=');
    if (eq > 0) {
      records.set(record.slice(0, eq), record.slice(eq + 1));
    }
    pos += length;
  }

  return records;
}

// =============================================================================
// PATH SAFETY
// =============================================================================

/**
 * Resolve an entry path under root, rejecting anything that lands outside it
 */
export function resolveEntryPath(root: string, entryName: string): string {
  if (entryName.includes('\0')) {
    throw new ExtractError('Entry path contains a NUL byte', entryName);
  }
  if (path.isAbsolute(entryName) || path.win32.isAbsolute(entryName)) {
    throw new ExtractError(`Refusing absolute entry path "${entryName}"`, entryName);
  }

  const target = path.resolve(root, entryName);
  const relative = path.relative(root, target);
  if (relative === '..' || relative.startsWith(`..${path.sep}`) || path.isAbsolute(relative)) {
    throw new ExtractError(`Entry "${entryName}" resolves outside the destination directory`, entryName);
  }
  return target;
}

// =============================================================================
// STREAM READER
// =============================================================================

class TarStreamReader {
  readonly summary: ExtractSummary = { directories: 0, files: 0, skipped: 0, bytes: 0 };

  /** Name of the entry being processed, for error reports */
  entryName: string | undefined;

  private pending: Buffer = Buffer.alloc(0);
  private active: ActiveEntry | null = null;
  private overrides: { path?: string; size?: number } = {};
  private zeroBlocks = 0;
  private finished = false;

  constructor(
    private readonly root: string,
    private readonly options: ExtractOptions
  ) {}

  async write(chunk: Buffer): Promise<void> {
    if (this.finished) return;
    this.pending = this.pending.length > 0 ? Buffer.concat([this.pending, chunk]) : chunk;

    while (!this.finished) {
      if (this.active) {
        if (!(await this.advance(this.active))) break;
        this.active = null;
      } else {
        if (this.pending.length < BLOCK_SIZE) break;
        await this.begin(this.take(BLOCK_SIZE));
      }
    }
  }

  /** Called once gunzip has drained */
  async end(): Promise<void> {
    if (this.finished) return;

    if (this.active) {
      if (!this.active.done && this.active.remaining > 0) {
        throw new ExtractError('Unexpected end of archive', this.active.name);
      }
      if (!this.active.done) await this.complete(this.active);
      this.active = null;
    }

    if (!isZeroBlock(this.pending)) {
      throw new ExtractError('Unexpected end of archive inside an entry header');
    }
  }

  /** Release the open file handle after a failure */
  async abort(): Promise<void> {
    const sink = this.active?.sink;
    this.active = null;
    if (sink?.kind === 'file') {
      // the original failure is what gets reported
      await sink.handle.close().catch(() => undefined);
    }
  }

  private take(length: number): Buffer {
    const out = this.pending.subarray(0, length);
    this.pending = this.pending.subarray(length);
    return out;
  }

  private async begin(block: Buffer): Promise<void> {
    if (isZeroBlock(block)) {
      // two zero blocks mark the end; a lone one is ignored
      this.zeroBlocks++;
      if (this.zeroBlocks >= 2) this.finished = true;
      return;
    }
    this.zeroBlocks = 0;

    const header = parseHeader(block);
    const isMeta = header.typeflag === 'x' || header.typeflag === 'g' || header.typeflag === 'L';
    const name = isMeta ? header.name : (this.overrides.path ?? header.name);
    const size = isMeta ? header.size : (this.overrides.size ?? header.size);
    this.entryName = name;

    let sink: EntrySink;
    if (isMeta) {
      sink = { kind: 'meta', typeflag: header.typeflag, chunks: [] };
    } else {
      this.overrides = {};
      sink = await this.openSink(header, name, size);
    }

    this.active = {
      name,
      remaining: size,
      padding: (BLOCK_SIZE - (size % BLOCK_SIZE)) % BLOCK_SIZE,
      done: false,
      sink,
    };
  }

  private async openSink(header: TarHeader, name: string, size: number): Promise<EntrySink> {
    const mode = header.mode & 0o777;
    const isRegular = header.typeflag === '0' || header.typeflag === '\0' || header.typeflag === '7';
    // pre-POSIX archives mark directories only by a trailing slash
    const isDirectory = header.typeflag === '5' || (isRegular && name.endsWith('/'));
    const isFile = isRegular && !isDirectory;

    if (isDirectory) {
      const target = resolveEntryPath(this.root, name);
      await fs.promises.mkdir(target, { recursive: true });
      this.summary.directories++;
      this.options.onEntry?.({ path: name, type: 'directory', size: 0, mode });
      return { kind: 'skip' };
    }

    if (!isFile) {
      this.summary.skipped++;
      return { kind: 'skip' };
    }

    const target = resolveEntryPath(this.root, name);
    if (target === this.root) {
      throw new ExtractError('File entry has an empty path', name);
    }
    await fs.promises.mkdir(path.dirname(target), { recursive: true });
    const fileMode = mode || DEFAULT_FILE_MODE;
    const handle = await fs.promises.open(target, 'w', fileMode);
    try {
      await handle.chmod(fileMode);
    } catch (error) {
      await handle.close();
      throw error;
    }
    return { kind: 'file', entry: { path: name, type: 'file', size, mode: fileMode }, handle };
  }

  /**
   * Feed buffered bytes to the active entry. Returns true once the entry,
   * including its block padding, has been consumed.
   */
  private async advance(active: ActiveEntry): Promise<boolean> {
    if (!active.done) {
      if (active.remaining > 0) {
        if (this.pending.length === 0) return false;
        const data = this.take(Math.min(active.remaining, this.pending.length));
        active.remaining -= data.length;
        await this.consume(active.sink, data);
        if (active.remaining > 0) return false;
      }
      await this.complete(active);
    }

    if (active.padding > 0) {
      if (this.pending.length === 0) return false;
      const skipped = this.take(Math.min(active.padding, this.pending.length));
      active.padding -= skipped.length;
      if (active.padding > 0) return false;
    }
    return true;
  }

  private async consume(sink: EntrySink, data: Buffer): Promise<void> {
    if (sink.kind === 'file') {
      let offset = 0;
      while (offset < data.length) {
        const { bytesWritten } = await sink.handle.write(data, offset, data.length - offset);
        offset += bytesWritten;
      }
      this.summary.bytes += data.length;
    } else if (sink.kind === 'meta') {
      sink.chunks.push(Buffer.from(data));
    }
  }

  /** Entry body fully read: close files, apply extended headers */
  private async complete(active: ActiveEntry): Promise<void> {
    active.done = true;
    const sink = active.sink;

    if (sink.kind === 'file') {
      await sink.handle.close();
      this.summary.files++;
      this.options.onEntry?.(sink.entry);
      return;
    }

    if (sink.kind !== 'meta') return;
    const data = Buffer.concat(sink.chunks);

    if (sink.typeflag === 'L') {
      const nul = data.indexOf(0);
      this.overrides.path = data.toString('utf8', 0, nul === -1 ? data.length : nul);
    } else if (sink.typeflag === 'x') {
      const records = parsePaxRecords(data);
      const paxPath = records.get('path');
      const paxSize = records.get('size');
      if (paxPath !== undefined) this.overrides.path = paxPath;
      if (paxSize !== undefined) {
        if (!/^\d+$/.test(paxSize)) {
          throw new ExtractError(`Malformed pax size "${paxSize}"`, active.name);
        }
        this.overrides.size = parseInt(paxSize, 10);
      }
    }
    // 'g' (global pax header) carries nothing needed for extraction
  }
}

// =============================================================================
// PUBLIC API
// =============================================================================

function toExtractError(error: unknown, entryName: string | undefined): SyncError {
  if (error instanceof SyncError) return error;

  const err = toError(error);
  const code = errnoCode(error) ?? '';
  if (code.startsWith('Z_')) {
    return new ExtractError(`Failed to decompress archive: ${err.message}`, entryName, { cause: error });
  }
  return new ExtractError(
    entryName ? `Failed to extract "${entryName}": ${err.message}` : `Failed to read archive: ${err.message}`,
    entryName,
    { cause: error }
  );
}

/**
 * Extract a tar.gz stream into destDir
 */
export async function extractTarGz(
  source: Readable,
  destDir: string,
  options: ExtractOptions = {}
): Promise<ExtractSummary> {
  const root = path.resolve(destDir);
  const gunzip = zlib.createGunzip();
  const reader = new TarStreamReader(root, options);

  source.on('error', (err) => gunzip.destroy(err));
  source.pipe(gunzip);

  try {
    await fs.promises.mkdir(root, { recursive: true });
    for await (const chunk of gunzip) {
      await reader.write(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
    }
    await reader.end();
  } catch (error) {
    await reader.abort();
    source.unpipe(gunzip);
    source.destroy();
    gunzip.destroy();
    throw toExtractError(error, reader.entryName);
  }

  return reader.summary;
}

/**
 * Extract a tar.gz file from disk into destDir
 */
export function extractTarGzFile(
  archivePath: string,
  destDir: string,
  options: ExtractOptions = {}
): Promise<ExtractSummary> {
  return extractTarGz(fs.createReadStream(archivePath), destDir, options);
}
