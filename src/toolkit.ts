import { DirectoryLister } from './application/services/directory-lister';
import { DirectoryWalker } from './application/services/directory-walker';
import { TempResources } from './application/services/temp-resources';
import { TextFileService } from './application/services/text-file-service';
import { BomEncodingDetector } from './infrastructure/bom-encoding-detector';
import { NodeFileSystem } from './infrastructure/node-file-system';
import { ProcessRunner } from './infrastructure/process-runner';
import { RandomTempName } from './infrastructure/random-temp-name';
import { loadConfig } from './utils/load-config';
import type { ToolkitConfig } from './utils/load-config';

export type Toolkit = {
  config: ToolkitConfig;
  lister: DirectoryLister;
  walker: DirectoryWalker;
  text: TextFileService;
  temp: TempResources;
};

/** Wire the services to the Node.js adapters. */
export const createToolkit = (config: ToolkitConfig = loadConfig()): Toolkit => {
  const fileSystem = new NodeFileSystem();

  return {
    config,
    lister: new DirectoryLister(fileSystem),
    walker: new DirectoryWalker(fileSystem),
    text: new TextFileService(fileSystem, new BomEncodingDetector(), config.defaultEncoding),
    temp: new TempResources(fileSystem, new RandomTempName(), new ProcessRunner(), config),
  };
};
