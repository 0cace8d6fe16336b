/**
 * `policy-scan` command: evaluates manifest files and prints a report.
 *
 * Exit codes:
 * - `0` no verdict failed
 * - `1` a verdict failed, a document was malformed, or evaluation timed out
 * - `2` usage or configuration error
 *
 * @module cli
 */

import { parseArgs } from 'util';
import { getConfig, isValidEnvironment, readExternalValues } from '../config';
import { PolicyEvaluator, structuralErrorVerdict } from './engine/evaluator';
import { loadRegistry } from './engine/registry';
import { buildReport, formatText, ResourceReport } from './engine/reporter';
import { createLogger, Logger } from './logger';
import { buildCatalog } from './policies/catalog';
import { loadManifestFile, loadRuleFiles } from './policies/loader';
import { ConfigurationError, isPolicyEngineError, StructuralError } from './types/errors';
import { Environment } from './types/config';
import { errorMessage } from './utils';

export const EXIT_OK = 0;
export const EXIT_FAILED = 1;
export const EXIT_USAGE = 2;

export const USAGE = `Usage: policy-scan [options] <manifest files...>

Options:
  -e, --env <name>        Configuration environment: dev, staging, production (default: production)
  -r, --rules <file>      Additional rule file, YAML or JSON (repeatable)
      --no-builtin        Do not register the built-in rule catalog
      --include-skipped   Report a skip verdict for every rule that does not apply
  -f, --format <format>   Output format: text or json (default: text)
  -t, --timeout <ms>      Per-manifest evaluation deadline, 0 disables it
  -h, --help              Show this help`;

/**
 * Minimal writable target; `process.stdout` satisfies it.
 */
export interface OutputStream {
  write(chunk: string): unknown;
}

/**
 * Process boundary of the command.
 */
export interface CliIO {
  readonly stdout: OutputStream;
  readonly stderr: OutputStream;
  /** Environment variables, `process.env` by default */
  readonly env?: NodeJS.ProcessEnv;
  /** Overrides the logger built from configuration */
  readonly logger?: Logger;
}

type OutputFormat = 'text' | 'json';

interface ScanOptions {
  readonly environment: Environment;
  readonly ruleFiles: readonly string[];
  readonly builtin: boolean;
  readonly includeSkipped: boolean;
  readonly format: OutputFormat;
  readonly timeoutMs?: number;
  readonly manifestFiles: readonly string[];
}

class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

function readArgs(argv: readonly string[]) {
  try {
    return parseArgs({
      args: [...argv],
      allowPositionals: true,
      strict: true,
      options: {
        env: { type: 'string', short: 'e' },
        rules: { type: 'string', short: 'r', multiple: true },
        'no-builtin': { type: 'boolean' },
        'include-skipped': { type: 'boolean' },
        format: { type: 'string', short: 'f' },
        timeout: { type: 'string', short: 't' },
        help: { type: 'boolean', short: 'h' },
      },
    });
  } catch (error) {
    throw new UsageError(errorMessage(error));
  }
}

function parseOptions(argv: readonly string[]): ScanOptions | 'help' {
  const { values, positionals } = readArgs(argv);
  if (values.help) {
    return 'help';
  }

  const environment = values.env ?? 'production';
  if (!isValidEnvironment(environment)) {
    throw new UsageError(`Invalid environment: ${environment}. Must be one of: dev, staging, production`);
  }

  const format = values.format ?? 'text';
  if (format !== 'text' && format !== 'json') {
    throw new UsageError(`Invalid format: ${format}. Must be text or json`);
  }

  let timeoutMs: number | undefined;
  if (values.timeout !== undefined) {
    timeoutMs = Number(values.timeout);
    if (!Number.isInteger(timeoutMs) || timeoutMs < 0) {
      throw new UsageError(`Invalid timeout: ${values.timeout}. Must be a non-negative integer`);
    }
  }

  if (positionals.length === 0) {
    throw new UsageError('No manifest files given');
  }

  return {
    environment,
    ruleFiles: values.rules ?? [],
    builtin: !values['no-builtin'],
    includeSkipped: values['include-skipped'] ?? false,
    format,
    timeoutMs,
    manifestFiles: positionals,
  };
}

async function scan(options: ScanOptions, io: CliIO): Promise<number> {
  const config = getConfig(options.environment, readExternalValues(io.env ?? process.env));
  const logger = io.logger ?? createLogger({ name: 'policy-scan', level: config.logging.level });

  const descriptors = [
    ...(options.builtin ? buildCatalog(config.catalog) : []),
    ...(await loadRuleFiles(options.ruleFiles)),
  ];
  const registry = loadRegistry(descriptors);
  logger.debug({ rules: registry.size, kinds: registry.kinds() }, 'registry loaded');

  const evaluator = new PolicyEvaluator(registry, {
    logger,
    includeSkipped: options.includeSkipped || config.evaluation.includeSkipped,
  });
  const timeoutMs = options.timeoutMs ?? config.evaluation.timeoutMs;

  const resources: ResourceReport[] = [];
  for (const file of options.manifestFiles) {
    for (const { source, document } of await loadManifestFile(file)) {
      const deadline = timeoutMs > 0 ? Date.now() + timeoutMs : undefined;
      try {
        const verdicts = evaluator.evaluate(document, { deadline });
        resources.push({ resource: `${verdicts[0]?.resource ?? 'manifest'} (${source})`, verdicts });
      } catch (error) {
        if (!(error instanceof StructuralError)) {
          throw error;
        }
        logger.warn({ source, err: error.toJSON() }, 'document rejected');
        resources.push({ resource: source, verdicts: [structuralErrorVerdict(error)] });
      }
    }
  }

  const report = buildReport(resources);
  logger.info({ ...report.summary }, 'scan complete');

  io.stdout.write(options.format === 'json' ? `${JSON.stringify(report, null, 2)}\n` : `${formatText(report)}\n`);
  return report.summary.result === 'fail' ? EXIT_FAILED : EXIT_OK;
}

/**
 * Run the command.
 *
 * Engine errors are written to `stderr` and mapped to an exit code.
 *
 * @param argv - Arguments after the executable and script path
 * @returns The process exit code
 */
export async function runScan(argv: readonly string[], io: CliIO): Promise<number> {
  try {
    const options = parseOptions(argv);
    if (options === 'help') {
      io.stdout.write(`${USAGE}\n`);
      return EXIT_OK;
    }
    return await scan(options, io);
  } catch (error) {
    if (error instanceof UsageError) {
      io.stderr.write(`policy-scan: ${error.message}\n\n${USAGE}\n`);
      return EXIT_USAGE;
    }
    if (error instanceof ConfigurationError) {
      io.stderr.write(`policy-scan: ${error.message}\n`);
      error.issues.forEach((issue) => io.stderr.write(`  - ${issue}\n`));
      return EXIT_USAGE;
    }
    if (isPolicyEngineError(error)) {
      io.stderr.write(`policy-scan: ${error.toLogString()}\n`);
      return EXIT_FAILED;
    }
    throw error;
  }
}
