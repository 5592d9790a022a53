/**
 * Default CLI actions: build config and strategy once, run one workflow,
 * and turn the result into an exit code
 */

import { createConfig, resolveCloudTarget } from '../config/index.js';
import type { AppConfig } from '../config/index.js';
import { SaveLinker } from '../core/index.js';
import type { OperationResult } from '../core/index.js';
import {
  currentEnv,
  findInstallation,
  findSavesPath,
  getPlatformHint,
} from '../detection/index.js';
import type { DetectionEnv } from '../detection/index.js';
import { createLinkStrategy, detectPlatform, getPlatformName } from '../link/index.js';
import type { HostPlatform, LinkStrategy } from '../link/index.js';
import { SaveLinkerError, describeError, exitCodeForKind, getExitCode } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import type { LogSink } from '../utils/logger.js';
import type { CliHandlers, GlobalOptions, WorkflowRequest } from './types.js';

export interface HandlerDeps {
  platform?: HostPlatform;
  strategy?: LinkStrategy;
  env?: NodeJS.ProcessEnv;
  detectionEnv?: DetectionEnv;
  sink?: LogSink;
  /** Receives report lines (backup list, detection results) */
  print?: (line: string) => void;
}

function buildConfig(options: GlobalOptions, env: NodeJS.ProcessEnv): AppConfig {
  return createConfig(
    { backupRoot: options.backupRoot, appName: options.appName, gameId: options.game },
    env
  );
}

/**
 * Log a failure thrown outside a workflow (bad config, unreadable backup root)
 */
function reportError(error: unknown): number {
  if (error instanceof SaveLinkerError) {
    error.log();
  } else {
    getLogger().error(describeError(error));
  }
  return getExitCode(error);
}

function dispatch(linker: SaveLinker, request: WorkflowRequest): Promise<OperationResult> {
  switch (request.workflow) {
    case 'migrate':
      return linker.migrate(request.saveDir, resolveCloudTarget(request.cloudRoot));
    case 'link':
      return linker.link(request.saveDir, resolveCloudTarget(request.cloudRoot));
    case 'restore':
      return linker.restore(request.saveDir, request.backupPath);
  }
}

export function createHandlers(deps: HandlerDeps = {}): CliHandlers {
  const platform = deps.platform ?? detectPlatform();
  const env = deps.env ?? process.env;

  const logger = () => getLogger();
  const print = deps.print ?? ((line: string) => logger().info(line));

  async function runWorkflow(request: WorkflowRequest, options: GlobalOptions): Promise<number> {
    const log = getLogger({ verbose: options.verbose });
    const config = buildConfig(options, env);
    const strategy = deps.strategy ?? createLinkStrategy(platform);
    const linker = new SaveLinker(config, strategy, {
      sink: deps.sink ?? log.createSink(),
      platform,
    });

    log.debug(`Platform: ${getPlatformName(platform)} (${strategy.kind})`);
    log.debug(`Backup root: ${config.backupRoot}`);

    const result = await dispatch(linker, request);

    if (result.success) {
      log.info(result.message);
      if (result.backupPath) {
        log.info(`Backup: ${result.backupPath}`);
      }
      return 0;
    }
    log.error(`${request.workflow} failed`);
    return result.errorKind ? exitCodeForKind(result.errorKind) : 1;
  }

  return {
    async workflow(request, options) {
      try {
        return await runWorkflow(request, options);
      } catch (error) {
        return reportError(error);
      }
    },

    async backups(options) {
      try {
        getLogger({ verbose: options.verbose });
        const config = buildConfig(options, env);
        const linker = new SaveLinker(config, deps.strategy ?? createLinkStrategy(platform), {
          sink: deps.sink ?? logger().createSink(),
          platform,
        });
        const manifests = await linker.listBackups();
        if (manifests.length === 0) {
          print(`No backups recorded under ${config.backupRoot}`);
          return 0;
        }
        for (const manifest of manifests) {
          print(`${manifest.createdAt}  ${manifest.backupPath}  (from ${manifest.saveDir})`);
        }
        return 0;
      } catch (error) {
        return reportError(error);
      }
    },

    async detect(options) {
      try {
        getLogger({ verbose: options.verbose });
        const config = buildConfig(options, env);
        const profile = config.gameProfile;
        const detectionEnv = deps.detectionEnv ?? currentEnv();

        print(`Platform: ${getPlatformName(platform)}`);
        const saves = await findSavesPath(profile, platform, detectionEnv);
        print(saves ? `Saves: ${saves}` : 'Saves: not found');
        const install = await findInstallation(profile, platform, detectionEnv);
        print(install ? `${profile.name}: ${install}` : `${profile.name}: installation not found`);
        print(getPlatformHint(profile, platform));
        return 0;
      } catch (error) {
        return reportError(error);
      }
    },
  };
}
