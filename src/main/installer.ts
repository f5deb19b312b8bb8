import path from 'node:path';
import type { OrchestrationRequest } from '@main/services/orchestrator/UpgradeOrchestrator';
import type { UpgraderCommand } from '@main/services/handoff/UpgraderLauncher';
import { createUpgradePipeline, readBooleanFlag, resolveBaseDir } from '@main/bootstrap';
import { INSTALLER_USAGE, parseInstallerArgs, type InstallerArgs } from '@main/cli/installer-args';
import { createProgressReporter, exitCodeFor, formatResult } from '@main/cli/progress-reporter';

export async function runInstaller(argv: readonly string[], env: NodeJS.ProcessEnv = process.env): Promise<number> {
  let args: InstallerArgs;
  try {
    args = parseInstallerArgs(argv);
  } catch (error) {
    process.stderr.write(`${error instanceof Error ? error.message : String(error)}\n${INSTALLER_USAGE}\n`);
    return 2;
  }

  if (args.help) {
    process.stdout.write(`${INSTALLER_USAGE}\n`);
    return 0;
  }

  const { orchestrator, logger } = createUpgradePipeline({
    baseDir: resolveBaseDir(env),
    env,
    consoleLevel: readBooleanFlag(env, 'STOREFRONT_UPGRADE_VERBOSE') ? 'debug' : null,
    upgraderCommand: args.inPlace ? null : resolveUpgraderCommand(env)
  });

  const reporter = createProgressReporter((line) => process.stdout.write(`${line}\n`));
  const controller = new AbortController();
  const onSigint = () => {
    logger.warn('installer.sigint');
    controller.abort();
  };
  process.once('SIGINT', onSigint);

  const request: OrchestrationRequest = {
    mode: args.reconfigure ? 'reconfigure' : 'install',
    details: args.details,
    signal: controller.signal,
    onTransition: reporter.onTransition,
    onProgress: reporter.onProgress,
    confirmBreakingChanges: (validation) => {
      process.stdout.write(`${validation.warningMessage ?? 'Mudancas incompativeis:'}\n`);
      for (const change of validation.breakingChanges ?? []) {
        process.stdout.write(`  - ${change}\n`);
      }
      if (!args.acceptBreakingChanges) {
        process.stdout.write('Execute novamente com --yes para confirmar.\n');
      }
      return args.acceptBreakingChanges;
    }
  };
  if (args.installPath) {
    request.installPath = args.installPath;
  }
  if (args.targetVersion) {
    request.targetVersion = args.targetVersion;
  }

  try {
    const result = await orchestrator.run(request);
    process.stdout.write(`${formatResult(result)}\n`);
    return exitCodeFor(result);
  } finally {
    process.removeListener('SIGINT', onSigint);
  }
}

function resolveUpgraderCommand(env: NodeJS.ProcessEnv): UpgraderCommand {
  const explicit = env.STOREFRONT_UPGRADER_PATH?.trim();
  return {
    executable: process.execPath,
    args: [explicit ? path.resolve(explicit) : path.join(__dirname, 'upgrader.js')]
  };
}

if (require.main === module) {
  runInstaller(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      process.stderr.write(`${error instanceof Error ? (error.stack ?? error.message) : String(error)}\n`);
      process.exitCode = 1;
    });
}
