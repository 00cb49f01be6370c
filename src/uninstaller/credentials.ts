import { spawnSync } from 'child_process';
import { z } from 'zod';
import { CloudKind } from '../core/cloud';
import { UninstallError } from '../core/errors';
import { KubeconfigDocument, execPluginOf } from './kubeconfig';

/** AKS AAD server application; tokens for it authenticate against any AKS API server. */
export const AKS_SERVER_APP_ID = '6dae42f8-4368-4678-94ff-3960e28e3630';

const COMMAND_TIMEOUT_MS = 10_000;

export interface CommandResult {
  status: number | null;
  stdout: string;
  stderr: string;
  error?: Error;
}

export type CommandRunner = (command: string, args: string[], env?: Record<string, string>) => CommandResult;

export const runCommand: CommandRunner = (command, args, env = {}) => {
  const result = spawnSync(command, args, {
    encoding: 'utf8',
    timeout: COMMAND_TIMEOUT_MS,
    stdio: ['ignore', 'pipe', 'pipe'],
    env: { ...process.env, ...env },
  });
  return {
    status: result.status,
    stdout: result.stdout || '',
    stderr: result.stderr || '',
    error: result.error,
  };
};

/**
 * Obtains a bearer token for a cluster whose kubeconfig relies on an exec
 * credential plugin that cannot run inside the provider process.
 */
export interface CredentialRefresher {
  refresh(cloud: CloudKind | undefined, kubeconfig: KubeconfigDocument): Promise<string>;
}

const execCredential = z.object({
  status: z.object({ token: z.string().min(1) }),
});

/** Fetches tokens through each cloud's CLI. */
export class CliCredentialRefresher implements CredentialRefresher {
  constructor(private readonly run: CommandRunner = runCommand) {}

  async refresh(cloud: CloudKind | undefined, kubeconfig: KubeconfigDocument): Promise<string> {
    switch (cloud) {
      case 'gcp':
        return this.output('gcloud', ['auth', 'print-access-token']);
      case 'azure':
        return this.output('az', [
          'account',
          'get-access-token',
          '--resource',
          AKS_SERVER_APP_ID,
          '--query',
          'accessToken',
          '-o',
          'tsv',
        ]);
      default:
        return this.fromExecPlugin(kubeconfig);
    }
  }

  private fromExecPlugin(kubeconfig: KubeconfigDocument): string {
    const plugin = execPluginOf(kubeconfig);
    if (!plugin) {
      throw new UninstallError('kubeconfig has no exec credential plugin to run');
    }
    const output = this.output(plugin.command, plugin.args, plugin.env);
    let credential: unknown;
    try {
      credential = JSON.parse(output);
    } catch (error) {
      throw new UninstallError(`${plugin.command} did not print an ExecCredential document`, { cause: error });
    }
    const parsed = execCredential.safeParse(credential);
    if (!parsed.success) {
      throw new UninstallError(`${plugin.command} printed an ExecCredential without status.token`);
    }
    return parsed.data.status.token;
  }

  private output(command: string, args: string[], env?: Record<string, string>): string {
    const result = this.run(command, args, env);
    if (result.error) {
      throw new UninstallError(`${command} failed: ${result.error.message}`, { cause: result.error });
    }
    if (result.status !== 0) {
      throw new UninstallError(`${command} exited with ${result.status}: ${result.stderr.trim()}`);
    }
    const text = result.stdout.trim();
    if (!text) {
      throw new UninstallError(`${command} printed nothing`);
    }
    return text;
  }
}
