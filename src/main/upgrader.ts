import { createUpgradePipeline, readBooleanFlag, resolveBaseDir } from '@main/bootstrap';
import { createProgressReporter, exitCodeFor, formatResult } from '@main/cli/progress-reporter';
import { decodeHandoff } from '@main/services/handoff/HandoffProtocol';

/** Exit code for a malformed handoff: nothing was attempted. */
export const HANDOFF_DECODE_EXIT_CODE = 2;

export async function runUpgrader(argv: readonly string[], env: NodeJS.ProcessEnv = process.env): Promise<number> {
  const decoded = decodeHandoff(argv);
  if (!decoded.ok) {
    process.stderr.write(`${decoded.errorMessage}\n`);
    return HANDOFF_DECODE_EXIT_CODE;
  }

  const { orchestrator, logger } = createUpgradePipeline({
    baseDir: resolveBaseDir(env),
    env,
    consoleLevel: readBooleanFlag(env, 'STOREFRONT_UPGRADE_VERBOSE') ? 'debug' : null
  });
  const { installation, packagePath, targetVersion } = decoded.payload;
  logger.info('upgrader.start', {
    siteName: installation.siteName,
    installPath: installation.installPath,
    version: installation.version,
    packagePath,
    targetVersion
  });

  const reporter = createProgressReporter((line) => process.stdout.write(`${line}\n`));
  const result = await orchestrator.run({
    mode: 'upgrade',
    installation,
    stagedArtifactPath: packagePath,
    targetVersion,
    onTransition: reporter.onTransition,
    onProgress: reporter.onProgress
  });

  process.stdout.write(`${formatResult(result)}\n`);
  return exitCodeFor(result);
}

if (require.main === module) {
  runUpgrader(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      process.stderr.write(`${error instanceof Error ? (error.stack ?? error.message) : String(error)}\n`);
      process.exitCode = 1;
    });
}
