import { Command, CommanderError, Option } from 'commander';
import { z } from 'zod';
import { config, getConfigSummary, LOG_LEVELS, validateConfig } from './core/config';
import { CancelledError, DomainError, ManifestError } from './core/errors';
import { EXIT_INTERRUPTED, EXIT_INVALID, EXIT_OK } from './core/exitCodes';
import { logger } from './core/logger';
import type { TargetObject } from './core/types';
import {
  contextNamespace,
  KubernetesApiClient,
  loadKubeConfig,
} from './clients/kube.client';
import { readManifests } from './manifests/manifest.loader';
import { exitCodeFor, formatReport, REPORT_FORMATS } from './report/report.format';
import { applyBatch } from './services/apply.service.core';
import type { ApiClient } from './services/apply.service.types';

export interface Connection {
  client: ApiClient;
  // Namespace of the current kubeconfig context, if it sets one
  namespace?: string;
}

export interface CliDependencies {
  connect(options: { kubeconfig?: string; fieldManager: string }): Connection;
  readManifests(path: string, options: { defaultNamespace?: string }): Promise<TargetObject[]>;
  write(text: string): void;
  writeErr(text: string): void;
  signal?: AbortSignal;
}

export function defaultDependencies(): CliDependencies {
  return {
    connect({ kubeconfig, fieldManager }) {
      const kubeConfig = loadKubeConfig(kubeconfig);
      return {
        client: KubernetesApiClient.fromKubeConfig(kubeConfig, { fieldManager }),
        namespace: contextNamespace(kubeConfig),
      };
    },
    readManifests,
    write: text => process.stdout.write(text),
    writeErr: text => process.stderr.write(text),
  };
}

const ApplyOptionsSchema = z.object({
  filename: z.array(z.string().min(1)).min(1, 'at least one file is required'),
  namespace: z.string().min(1).optional(),
  kubeconfig: z.string().min(1).optional(),
  fieldManager: z.string().min(1),
  timeout: z.coerce.number().finite().min(0),
  operationTimeout: z.coerce.number().finite().min(0),
  parallelism: z.coerce.number().int().min(0),
  output: z.enum(REPORT_FORMATS),
  logLevel: z.enum(LOG_LEVELS).optional(),
});

export type ApplyOptions = z.infer<typeof ApplyOptionsSchema>;

const FLAG_NAMES: Record<string, string> = {
  filename: '--filename',
  namespace: '--namespace',
  kubeconfig: '--kubeconfig',
  fieldManager: '--field-manager',
  timeout: '--timeout',
  operationTimeout: '--operation-timeout',
  parallelism: '--parallelism',
  output: '--output',
  logLevel: '--log-level',
};

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function describeOptionIssues(error: z.ZodError): string {
  return error.errors
    .map(issue => {
      const key = String(issue.path[0] ?? '');
      return `Invalid value for ${FLAG_NAMES[key] ?? key}: ${issue.message}`;
    })
    .join('\n');
}

async function loadTargets(
  options: ApplyOptions,
  defaultNamespace: string | undefined,
  deps: CliDependencies
): Promise<TargetObject[]> {
  const targets: TargetObject[] = [];
  for (const file of options.filename) {
    targets.push(...(await deps.readManifests(file, { defaultNamespace })));
  }
  return targets;
}

/**
 * Validate flags, load manifests and run the batch. Resolves to the process exit code.
 */
export async function runApply(options: ApplyOptions, deps: CliDependencies): Promise<number> {
  if (options.logLevel) {
    logger.level = options.logLevel;
  }

  let connection: Connection;
  try {
    connection = deps.connect({ kubeconfig: options.kubeconfig, fieldManager: options.fieldManager });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.error({ err: error }, 'Failed to load kubeconfig');
    deps.writeErr(`error: failed to load kubeconfig: ${message}\n`);
    return EXIT_INVALID;
  }

  let targets: TargetObject[];
  try {
    targets = await loadTargets(options, options.namespace ?? connection.namespace, deps);
  } catch (error) {
    if (error instanceof ManifestError) {
      deps.writeErr(`error: ${error.message}\n`);
      return EXIT_INVALID;
    }
    throw error;
  }

  const report = await applyBatch(targets, {
    client: connection.client,
    parallelism: options.parallelism,
    timeoutMs: options.timeout * 1000,
    operationTimeoutMs: options.operationTimeout * 1000,
    signal: deps.signal,
  });

  deps.write(`${formatReport(report, options.output)}\n`);
  return exitCodeFor(report);
}

export function createProgram(deps: CliDependencies, onExit: (code: number) => void): Command {
  const program = new Command('batch-apply')
    .description('Apply Kubernetes manifests in no particular order, retrying until they converge')
    .configureOutput({
      writeOut: deps.write,
      writeErr: deps.writeErr,
    });

  program
    .command('apply')
    .description('Apply (or delete) every object found in the given manifests')
    .option('-f, --filename <path>', 'manifest file, "-" for stdin (repeatable)', collect, [])
    .option('-n, --namespace <namespace>', 'namespace for objects that do not set one')
    .option('--kubeconfig <path>', 'path to the kubeconfig file')
    .option('--field-manager <name>', 'field manager used for server-side apply', config.APPLY_FIELD_MANAGER)
    .option('--timeout <seconds>', 'give up retrying after this long, 0 = never', String(config.APPLY_TIMEOUT_SECONDS))
    .option(
      '--operation-timeout <seconds>',
      'per-object retry limit, 0 = only --timeout applies',
      String(config.APPLY_OPERATION_TIMEOUT_SECONDS)
    )
    .option('-p, --parallelism <count>', 'maximum concurrent API calls, 0 = unbounded', String(config.APPLY_PARALLELISM))
    .addOption(new Option('-o, --output <format>', 'report format').choices(REPORT_FORMATS).default('text'))
    .addOption(new Option('--log-level <level>', 'log level').choices(LOG_LEVELS))
    .action(async (raw: unknown, command: Command) => {
      const parsed = ApplyOptionsSchema.safeParse(raw);
      if (parsed.success) {
        onExit(await runApply(parsed.data, deps));
      } else {
        command.error(describeOptionIssues(parsed.error), {
          exitCode: EXIT_INVALID,
          code: 'batch-apply.invalidOption',
        });
      }
    });

  return program;
}

export interface SignalHost {
  on(signal: NodeJS.Signals, listener: () => void): void;
  exit(code: number): void;
}

const processHost: SignalHost = {
  on: (signal, listener) => {
    process.on(signal, listener);
  },
  exit: code => process.exit(code),
};

/**
 * First SIGINT/SIGTERM aborts the batch, in-flight calls are abandoned and
 * the report is still written. A second one exits at once.
 */
export function cancelOnSignals(controller: AbortController, host: SignalHost = processHost): void {
  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    host.on(signal, () => {
      if (controller.signal.aborted) {
        logger.warn({ signal }, 'Second signal received, exiting');
        host.exit(EXIT_INTERRUPTED);
        return;
      }
      logger.warn({ signal }, 'Cancelling batch');
      controller.abort(new CancelledError(`Cancelled by ${signal}`));
    });
  }
}

/**
 * Parse argv (node executable and script included) and run. Resolves to the exit code.
 */
export async function main(argv: readonly string[], deps: CliDependencies = defaultDependencies()): Promise<number> {
  const issues = validateConfig();
  if (issues.length > 0) {
    deps.writeErr(`error: invalid configuration:\n  ${issues.join('\n  ')}\n`);
    return EXIT_INVALID;
  }
  logger.debug({ config: getConfigSummary() }, 'Configuration loaded');

  let exitCode = EXIT_OK;
  const program = createProgram(deps, code => {
    exitCode = code;
  });
  program.exitOverride();
  program.commands.forEach(command => command.exitOverride());

  try {
    await program.parseAsync([...argv]);
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode === 0 ? EXIT_OK : EXIT_INVALID;
    }
    if (error instanceof DomainError) {
      logger.error({ err: error }, 'Batch could not be applied');
      deps.writeErr(`error: ${error.message}\n`);
      return EXIT_INVALID;
    }
    throw error;
  }
  return exitCode;
}
