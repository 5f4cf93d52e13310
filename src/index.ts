export * from './domain/path-model';
export * from './domain/path-composer';
export * from './domain/directory-entry';
export * from './domain/walk-options';
export * from './domain/errors';
export {
  ENCODING,
  CharacterConversionError,
  decodeStrict,
  encodeStrict,
  normalizeEncoding,
} from './domain/encoding';
export type { Encoding, EncodingAttempt } from './domain/encoding';
export type {
  DirectoryMatch,
  DirectoryReaderPort,
  FileSystemEntryType,
  FileSystemPort,
  IfExists,
  PathProbe,
  PermissionPort,
  RawFilePort,
} from './application/ports/file-system.port';
export { IF_EXISTS, FILE_SYSTEM_ENTRY_TYPE } from './application/ports/file-system.port';
export type { EncodingDetectorPort } from './application/ports/encoding-detector.port';
export type { TempNamePort, TempNameRequest } from './application/ports/temp-name.port';
export type { ProcessRunnerPort } from './application/ports/process-runner.port';
export { DirectoryLister } from './application/services/directory-lister';
export type { ListOptions } from './application/services/directory-lister';
export { DirectoryWalker } from './application/services/directory-walker';
export type { Visitor } from './application/services/directory-walker';
export { TextFileService } from './application/services/text-file-service';
export type { DestinationOptions, WriteTextOptions } from './application/services/text-file-service';
export { TempResources } from './application/services/temp-resources';
export type { ScopeBody, TempOptions, TempResource } from './application/services/temp-resources';
export { NodeFileSystem } from './infrastructure/node-file-system';
export { BomEncodingDetector } from './infrastructure/bom-encoding-detector';
export { RandomTempName } from './infrastructure/random-temp-name';
export { ProcessRunner } from './infrastructure/process-runner';
export { loadConfig } from './utils/load-config';
export type { ToolkitConfig } from './utils/load-config';
export { createToolkit } from './toolkit';
export type { Toolkit } from './toolkit';
