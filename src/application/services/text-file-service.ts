import type { EncodingDetectorPort } from '../ports/encoding-detector.port';
import type { IfExists, PermissionPort, RawFilePort } from '../ports/file-system.port';
import { IF_EXISTS } from '../ports/file-system.port';
import { CharacterConversionError, ENCODING, decodeStrict, encodeStrict, isUtf8 } from '../../domain/encoding';
import type { Encoding, EncodingAttempt } from '../../domain/encoding';
import {
  EncodingError,
  FileExistsError,
  InvalidCompositionError,
  WritePermissionError,
  errorMessage,
} from '../../domain/errors';
import { assertConcrete, canonicalize, directoryOf, formatPath } from '../../domain/path-model';
import type { AnyPath, Path } from '../../domain/path-model';
import { getLogger } from '../../utils/get-logger';

export type DestinationOptions = {
  ifExists?: IfExists;
  /** Set the owner-write bit on a read-only destination instead of failing. */
  forceWritable?: boolean;
};

export type WriteTextOptions = DestinationOptions & {
  encoding?: string;
  /** Single attempt under this encoding, no UTF-8 fallback. */
  overrideEncoding?: string;
};

type Conversion<T> = { ok: true; value: T } | { ok: false };

type Target = {
  path: Path;
  hostPath: string;
};

export class TextFileService {
  private readonly logger = getLogger();

  public constructor(
    private readonly files: RawFilePort & PermissionPort,
    private readonly detector: EncodingDetectorPort,
    private readonly defaultEncoding: Encoding = ENCODING.UTF8,
  ) { }

  /**
   * Read a file as text under `encoding`, falling back to UTF-8 once.
   * Throws a recoverable {@link EncodingError} when both fail; retry with
   * {@link readTextWithOverride}.
   */
  public async readText(file: AnyPath, encoding: string = this.defaultEncoding): Promise<string> {
    const { hostPath } = this.toTarget(file, 'readText');
    const bytes = await this.files.readBytes(hostPath);
    return this.withFallback(hostPath, encoding, (label) => decodeStrict(bytes, label));
  }

  public async readTextWithOverride(file: AnyPath, encoding: string): Promise<string> {
    const { hostPath } = this.toTarget(file, 'readTextWithOverride');
    const bytes = await this.files.readBytes(hostPath);
    return this.once(hostPath, encoding, (label) => decodeStrict(bytes, label));
  }

  public async writeText(file: AnyPath, text: string, options: WriteTextOptions = {}): Promise<void> {
    const target = this.toTarget(file, 'writeText');
    const { hostPath } = target;
    const ifExists = options.ifExists ?? IF_EXISTS.OVERWRITE;
    await this.prepareDestination(target, ifExists, options.forceWritable ?? false);

    const bytes =
      options.overrideEncoding === undefined
        ? this.withFallback(hostPath, options.encoding ?? this.defaultEncoding, (label) =>
          encodeStrict(text, label),
        )
        : this.once(hostPath, options.overrideEncoding, (label) => encodeStrict(text, label));

    await this.files.writeBytes(hostPath, bytes, ifExists);
  }

  public async readBytes(file: AnyPath): Promise<Uint8Array> {
    return this.files.readBytes(this.toTarget(file, 'readBytes').hostPath);
  }

  public async writeBytes(file: AnyPath, bytes: Uint8Array, options: DestinationOptions = {}): Promise<void> {
    const target = this.toTarget(file, 'writeBytes');
    const ifExists = options.ifExists ?? IF_EXISTS.OVERWRITE;
    await this.prepareDestination(target, ifExists, options.forceWritable ?? false);
    await this.files.writeBytes(target.hostPath, bytes, ifExists);
  }

  public async detectEncoding(file: AnyPath): Promise<Encoding | null> {
    return this.detector.detect(await this.readBytes(file));
  }

  private toTarget(file: AnyPath, operation: string): Target {
    const path = canonicalize(assertConcrete(file, operation));
    if (path.name === undefined) {
      throw new InvalidCompositionError(`${operation} needs a file path, got ${formatPath(path)}`);
    }
    return { path, hostPath: formatPath(path) };
  }

  private async prepareDestination(
    { path, hostPath }: Target,
    ifExists: IfExists,
    forceWritable: boolean,
  ): Promise<void> {
    const exists = await this.files.exists(hostPath);
    if (exists && ifExists === IF_EXISTS.ERROR) {
      throw new FileExistsError(hostPath);
    }

    if (exists && !(await this.files.isWritable(hostPath))) {
      if (!forceWritable) {
        throw new WritePermissionError(hostPath);
      }
      this.logger.info(`Making file writable: path=${hostPath}`);
      await this.files.makeWritable(hostPath);
    }

    await this.files.ensureDirectory(formatPath(directoryOf(path)));
  }

  private withFallback<T>(hostPath: string, encoding: string, convert: (label: string) => T): T {
    const attempts: EncodingAttempt[] = [];
    const first = this.attempt(encoding, false, attempts, convert);
    if (first.ok) {
      return first.value;
    }

    if (!isUtf8(encoding)) {
      this.logger.debug(`Falling back to ${ENCODING.UTF8}: path=${hostPath}, declared=${encoding}`);
      const second = this.attempt(ENCODING.UTF8, true, attempts, convert);
      if (second.ok) {
        return second.value;
      }
    }

    throw new EncodingError(hostPath, attempts, true);
  }

  private once<T>(hostPath: string, encoding: string, convert: (label: string) => T): T {
    const attempts: EncodingAttempt[] = [];
    const result = this.attempt(encoding, false, attempts, convert);
    if (result.ok) {
      return result.value;
    }
    throw new EncodingError(hostPath, attempts, false);
  }

  private attempt<T>(
    encoding: string,
    fallback: boolean,
    attempts: EncodingAttempt[],
    convert: (label: string) => T,
  ): Conversion<T> {
    try {
      const value = convert(encoding);
      attempts.push({ encoding, fallback, ok: true });
      return { ok: true, value };
    } catch (error) {
      if (!(error instanceof CharacterConversionError)) {
        throw error;
      }
      attempts.push({ encoding, fallback, ok: false, reason: errorMessage(error) });
      return { ok: false };
    }
  }
}
