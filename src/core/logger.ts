import * as pulumi from '@pulumi/pulumi';

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

/** Routes messages to the Pulumi engine so they show up against the current operation. */
export const pulumiLogger: Logger = {
  debug: (message) => void pulumi.log.debug(message),
  info: (message) => void pulumi.log.info(message),
  warn: (message) => void pulumi.log.warn(message),
  error: (message) => void pulumi.log.error(message),
};

// Used by the CLI: progress on stderr keeps stdout clean for scripting
export const consoleLogger: Logger = {
  debug: (message) => {
    if (process.env['BYOC_DEBUG']) process.stderr.write(`🔎 ${message}\n`);
  },
  info: (message) => process.stderr.write(`   ${message}\n`),
  warn: (message) => process.stderr.write(`⚠️  ${message}\n`),
  error: (message) => process.stderr.write(`❌ ${message}\n`),
};

/** Prefixes every message with `[scope]`. */
export function scoped(logger: Logger, scope: string): Logger {
  const tag = `[${scope}]`;
  return {
    debug: (message) => logger.debug(`${tag} ${message}`),
    info: (message) => logger.info(`${tag} ${message}`),
    warn: (message) => logger.warn(`${tag} ${message}`),
    error: (message) => logger.error(`${tag} ${message}`),
  };
}
