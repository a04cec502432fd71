#!/usr/bin/env node
// index.ts - CLI entry point: `sysstat-window [sar|atop|weblog]`
import Logger, { createLogger } from './common/logger';
import { ConfigurationError, describeError } from './common/errors';
import { AnalyzerConfig, loadConfig } from './config/config';
import { runSarAudit } from './service/sar-audit';
import { runAtopAudit } from './service/atop-audit';
import { runWebLogAudit } from './service/weblog-audit';

export type AuditMode = 'sar' | 'atop' | 'weblog';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_CONFIGURATION = 2;

const USAGE = 'usage: sysstat-window [sar|atop|weblog]';

export function parseMode(argv: readonly string[]): AuditMode | null {
  const [mode = 'sar'] = argv;
  return mode === 'sar' || mode === 'atop' || mode === 'weblog' ? mode : null;
}

class SysstatWindowApp {
  private config: AnalyzerConfig;
  private logger: Logger;

  constructor(config: AnalyzerConfig) {
    this.config = config;
    this.logger = createLogger('sysstat-window', config.debug, config.output.logDir);
  }

  public async run(mode: AuditMode): Promise<void> {
    const write = (line: string): void => {
      process.stdout.write(line + '\n');
    };

    if (mode === 'atop') {
      await runAtopAudit(this.config, { logger: this.logger.child('atop'), write });
    } else if (mode === 'weblog') {
      await runWebLogAudit(this.config, { logger: this.logger.child('weblog'), write });
    } else {
      await runSarAudit(this.config, { logger: this.logger.child('sar'), write });
    }
  }
}

export async function main(argv: readonly string[], env: NodeJS.ProcessEnv = process.env): Promise<number> {
  const mode = parseMode(argv);
  if (mode === null) {
    process.stderr.write(`${USAGE}\n`);
    return EXIT_CONFIGURATION;
  }

  try {
    const app = new SysstatWindowApp(loadConfig(env));
    await app.run(mode);
    return EXIT_OK;
  } catch (error) {
    if (error instanceof ConfigurationError) {
      process.stderr.write(`${error.message}\n`);
      return EXIT_CONFIGURATION;
    }
    process.stderr.write(`Audit failed: ${describeError(error)}\n`);
    return EXIT_FAILURE;
  }
}

if (require.main === module) {
  main(process.argv.slice(2))
    .then(code => {
      process.exitCode = code;
    })
    .catch(error => {
      process.stderr.write(`Fatal error: ${describeError(error)}\n`);
      process.exitCode = EXIT_FAILURE;
    });
}
