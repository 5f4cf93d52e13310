import type { ProcessRunnerPort } from '../ports/process-runner.port';
import type { RawFilePort } from '../ports/file-system.port';
import { IF_EXISTS } from '../ports/file-system.port';
import type { TempNamePort } from '../ports/temp-name.port';
import { FileExistsError, TempResourceError, errorMessage } from '../../domain/errors';
import { parseDirectoryPath, parsePath } from '../../domain/path-model';
import type { Path } from '../../domain/path-model';
import { getLogger } from '../../utils/get-logger';
import type { ToolkitConfig } from '../../utils/load-config';

const MAX_NAME_ATTEMPTS = 16;

export type TempOptions = {
  /** Overrides the configured temp directory for this call. */
  directory?: string;
  prefix?: string;
  suffix?: string;
};

export type TempResource = {
  path: Path;
  hostPath: string;
};

export type ScopeBody<T> = (resource: TempResource) => T | Promise<T>;

type Creator = (hostPath: string) => Promise<void>;

/**
 * Scoped temporary files, directories and FIFOs. The resource exists before
 * the body runs and is removed on every exit path.
 */
export class TempResources {
  private readonly logger = getLogger();

  public constructor(
    private readonly files: RawFilePort,
    private readonly names: TempNamePort,
    private readonly processes: ProcessRunnerPort,
    private readonly config: Pick<ToolkitConfig, 'tempDirectory'>,
  ) { }

  public withTempFile<T>(body: ScopeBody<T>, options: TempOptions = {}): Promise<T> {
    return this.scoped(
      (hostPath) => this.files.writeBytes(hostPath, new Uint8Array(0), IF_EXISTS.ERROR),
      parsePath,
      body,
      { prefix: 'tmp-', suffix: '.tmp', ...options },
    );
  }

  public withTempDirectory<T>(body: ScopeBody<T>, options: TempOptions = {}): Promise<T> {
    return this.scoped(
      (hostPath) => this.files.createDirectory(hostPath),
      parseDirectoryPath,
      body,
      { prefix: 'tmpdir-', suffix: '', ...options },
    );
  }

  public withTempFifo<T>(body: ScopeBody<T>, options: TempOptions = {}): Promise<T> {
    return this.scoped(
      async (hostPath) => {
        if (await this.files.exists(hostPath)) {
          throw new FileExistsError(hostPath);
        }
        await this.processes.run('mkfifo', [hostPath]);
      },
      parsePath,
      body,
      { prefix: 'fifo-', suffix: '', ...options },
    );
  }

  private async scoped<T>(
    create: Creator,
    toPath: (hostPath: string) => Path,
    body: ScopeBody<T>,
    options: TempOptions,
  ): Promise<T> {
    const hostPath = await this.acquire(create, options);
    const resource: TempResource = { path: toPath(hostPath), hostPath };

    let result: T;
    try {
      result = await body(resource);
    } catch (error) {
      await this.releaseAfterFailure(hostPath);
      throw error;
    }

    await this.files.remove(hostPath);
    return result;
  }

  private async acquire(create: Creator, options: TempOptions): Promise<string> {
    const directory = options.directory ?? this.config.tempDirectory;
    await this.files.ensureDirectory(directory);

    for (let attempt = 1; attempt <= MAX_NAME_ATTEMPTS; attempt += 1) {
      const hostPath = this.names.uniquePath({
        directory,
        prefix: options.prefix ?? '',
        suffix: options.suffix ?? '',
      });
      try {
        await create(hostPath);
        this.logger.debug(`Created temp resource: path=${hostPath}`);
        return hostPath;
      } catch (error) {
        if (!(error instanceof FileExistsError)) {
          throw error;
        }
        this.logger.debug(`Temp name taken, retrying: path=${hostPath}, attempt=${attempt}`);
      }
    }

    throw new TempResourceError(
      `Could not create a unique temp resource in ${directory} after ${MAX_NAME_ATTEMPTS} attempts`,
    );
  }

  private async releaseAfterFailure(hostPath: string): Promise<void> {
    try {
      await this.files.remove(hostPath);
    } catch (error) {
      this.logger.warn(
        { error: errorMessage(error) },
        `Failed to remove temp resource after error: path=${hostPath}`,
      );
    }
  }
}
