import { loadConfig, TaproomConfig } from "./config.js";
import { rootLogger } from "./logger.js";
import { BrewService } from "./services/brewService.js";
import { ProcessRunner } from "./services/commandRunner.js";
import { DiagnosticsService } from "./services/diagnosticsService.js";
import { MasService } from "./services/masService.js";
import { BrewPathResolver } from "./services/pathResolver.js";
import { ScutilProxySource } from "./services/proxySource.js";
import { QuarantineService } from "./services/quarantineService.js";

export interface Taproom {
  config: TaproomConfig;
  runner: ProcessRunner;
  resolver: BrewPathResolver;
  brew: BrewService;
  mas: MasService;
  quarantine: QuarantineService;
  diagnostics: DiagnosticsService;
}

export function createTaproom(config: TaproomConfig = loadConfig()): Taproom {
  rootLogger.level = config.logLevel;

  // scutil itself runs without a proxy source.
  const proxy = config.proxyEnabled
    ? new ScutilProxySource(new ProcessRunner({ pathPrefixes: config.pathPrefixes }))
    : undefined;
  const runner = new ProcessRunner({ proxy, pathPrefixes: config.pathPrefixes });
  const resolver = new BrewPathResolver(runner, { override: config.brewPath });
  const brew = new BrewService(runner, resolver);

  return {
    config,
    runner,
    resolver,
    brew,
    mas: new MasService(runner, config.masPath),
    quarantine: new QuarantineService(runner, brew),
    diagnostics: new DiagnosticsService(runner, resolver)
  };
}

export { loadConfig } from "./config.js";
export type { TaproomConfig, LogLevel } from "./config.js";
export * from "./errors.js";
export * from "./types.js";
export { rootLogger } from "./logger.js";
export { BrewService } from "./services/brewService.js";
export { ProcessRunner } from "./services/commandRunner.js";
export type { ProcessRunnerOptions } from "./services/commandRunner.js";
export { buildCommand, buildEnvironment } from "./services/commandBuilder.js";
export { BrewPathResolver } from "./services/pathResolver.js";
export { ScutilProxySource, StaticProxySource } from "./services/proxySource.js";
export { MasService } from "./services/masService.js";
export { QuarantineService } from "./services/quarantineService.js";
export { DiagnosticsService } from "./services/diagnosticsService.js";
export { sequenceStreams, sequenceTasks } from "./services/bulkSequencer.js";
export { parseBrewfile } from "./parser/brewfileParser.js";
export { parseByteSize, parseCleanupOutput } from "./parser/cleanupParser.js";
export { parseDependencyTree } from "./parser/dependencyTreeParser.js";
export { parseDoctorOutput } from "./parser/doctorParser.js";
export { EMPTY_RESULT_POLICY, isEmptyResult } from "./parser/emptyResultPolicy.js";
export {
  parseInfoResponse,
  parseOutdatedResponse,
  parseServicesResponse,
  parseTapsResponse
} from "./parser/infoParser.js";
export { parseNameList } from "./parser/listParser.js";
export { parseMasApps, parseOutdatedMasApps } from "./parser/masParser.js";
export { decodeQuarantineDate } from "./parser/quarantineParser.js";
export { parseSearchResults } from "./parser/searchParser.js";
