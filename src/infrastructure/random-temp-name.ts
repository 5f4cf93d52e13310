import { randomBytes } from 'node:crypto';
import path from 'node:path';

import type { TempNamePort, TempNameRequest } from '../application/ports/temp-name.port';

export class RandomTempName implements TempNamePort {
  public uniquePath({ directory, prefix, suffix }: TempNameRequest): string {
    return path.join(directory, `${prefix}${randomBytes(6).toString('hex')}${suffix}`);
  }
}
