#!/usr/bin/env node
/**
 * byoc CLI - operator tooling outside of a Pulumi run
 *
 * Commands:
 *   uninstall   - Run the in-cluster uninstall job, e.g. after a failed destroy
 */
import { readFileSync } from 'fs';
import { Command, InvalidArgumentError, Option } from 'commander';
import { CLOUDS, CloudKind } from './core/cloud';
import { errorMessage } from './core/errors';
import { Logger, consoleLogger } from './core/logger';
import { UNINSTALL_NAMESPACE } from './uninstaller/job';
import {
  DEFAULT_POLL_INTERVAL_SECONDS,
  DEFAULT_UNINSTALL_TIMEOUT_SECONDS,
  UninstallDeps,
  UninstallOptions,
  UninstallResult,
  runUninstall,
} from './uninstaller/uninstall';

interface UninstallCommandOptions {
  kubeconfig: string;
  image: string;
  cloud?: CloudKind;
  namespace: string;
  timeout: number;
  interval: number;
}

export interface CliDeps {
  readFile?: (path: string) => string;
  uninstall?: (options: UninstallOptions, deps: UninstallDeps) => Promise<UninstallResult>;
  logger?: Logger;
  exit?: (code: number) => void;
}

function positiveInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Not a positive integer.');
  }
  return parsed;
}

export function buildProgram(deps: CliDeps = {}): Command {
  const readFile = deps.readFile ?? ((path: string) => readFileSync(path, 'utf8'));
  const uninstall = deps.uninstall ?? runUninstall;
  const log = deps.logger ?? consoleLogger;
  const exit = deps.exit ?? ((code: number) => process.exit(code));

  const program = new Command();

  program
    .name('byoc')
    .description('BYOC control-plane operator tooling')
    .version('0.1.0');

  program
    .command('uninstall')
    .description('Run the cluster uninstall job and wait for it to finish')
    .requiredOption('-k, --kubeconfig <file>', 'Path to the cluster kubeconfig (JSON or YAML)')
    .requiredOption('-i, --image <ref>', 'Image that carries byoc-tools')
    .addOption(new Option('-c, --cloud <cloud>', 'Cloud the cluster runs on').choices(CLOUDS))
    .option('-n, --namespace <namespace>', 'Namespace to run the job in', UNINSTALL_NAMESPACE)
    .option('--timeout <seconds>', 'Give up after this many seconds', positiveInteger, DEFAULT_UNINSTALL_TIMEOUT_SECONDS)
    .option('--interval <seconds>', 'Seconds between status polls', positiveInteger, DEFAULT_POLL_INTERVAL_SECONDS)
    .action(async (opts: UninstallCommandOptions) => {
      try {
        const result = await uninstall(
          {
            kubeconfig: readFile(opts.kubeconfig),
            image: opts.image,
            cloud: opts.cloud,
            namespace: opts.namespace,
            timeoutSeconds: opts.timeout,
            pollIntervalSeconds: opts.interval,
          },
          { logger: log },
        );
        log.info(`✅ ${result.jobName}: ${result.phase}`);
      } catch (error) {
        log.error(`Error: ${errorMessage(error)}`);
        exit(1);
      }
    });

  return program;
}

if (require.main === module) {
  buildProgram()
    .parseAsync(process.argv)
    .catch((error: unknown) => {
      consoleLogger.error(`Error: ${errorMessage(error)}`);
      process.exit(1);
    });
}
