/**
 * CLI program definition
 *
 * `cluster status|start|stop|restart` and `deploy`. The exit code is the
 * only machine-readable signal: 0 on success, 1 on failure. `cluster status`
 * always exits 0.
 */

import { Command as CliCommand, Option } from 'commander';
import type { Logger } from 'pino';
import { DeployConfigSchema, EnvironmentSchema, loadConfig, type Environment } from '../config/app-config';
import { ENVIRONMENTS } from '../config/defaults';
import { createContainer } from '../app/container';
import type { PipelineRun } from '../domain/types/pipeline';
import { errorMessage, isApplicationError } from '../errors/index';
import { createLogger } from '../lib/logger';
import type { ClusterLifecycle } from '../services/cluster-lifecycle';
import { runDeployment } from '../workflows/deployment';
import type { DeployOptions } from '../workflows/types';

export type GlobalOptions = {
  config?: string;
  projectRoot?: string;
  logLevel?: string;
};

interface DeployCliOptions {
  env: string;
  skipBuild?: boolean;
  skipMonitoring?: boolean;
  portForward?: boolean;
}

export interface CliRuntime {
  cluster: Pick<ClusterLifecycle, 'status' | 'start' | 'stop' | 'restart'>;
  deploy(options: DeployOptions): Promise<PipelineRun>;
}

export interface RuntimeRequest {
  globals: GlobalOptions;
  env: Environment;
  logger: Logger;
  /** Aborts on Ctrl+C; running commands are terminated */
  signal: AbortSignal;
  /** Ignore the configuration file and use built-in defaults */
  defaults?: boolean;
}

export type RuntimeFactory = (request: RuntimeRequest) => CliRuntime;

export interface Interruption {
  signal: AbortSignal;
  dispose(): void;
}

export interface ProgramIO {
  createLogger(level?: string): Logger;
  setExitCode(code: number): void;
  interruption(): Interruption;
}

export const defaultRuntimeFactory: RuntimeFactory = ({ globals, env, logger, signal, defaults }) => {
  const config = defaults
    ? DeployConfigSchema.parse(globals.projectRoot !== undefined ? { projectRoot: globals.projectRoot } : {})
    : loadConfig({
        env,
        ...(globals.config !== undefined ? { configPath: globals.config } : {}),
        ...(globals.projectRoot !== undefined ? { projectRoot: globals.projectRoot } : {}),
      });
  const deps = createContainer(config, logger, {}, signal);
  return {
    cluster: deps.cluster,
    deploy: (options) => runDeployment(options, deps, signal),
  };
};

/**
 * Abort on the first SIGINT or SIGTERM; a second one gets the default behaviour
 */
export function processInterruption(): Interruption {
  const controller = new AbortController();
  const onSignal = (): void => controller.abort();
  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);
  return {
    signal: controller.signal,
    dispose: () => {
      process.off('SIGINT', onSignal);
      process.off('SIGTERM', onSignal);
    },
  };
}

export const defaultIO: ProgramIO = {
  createLogger: (level) => createLogger(level ? { level } : {}),
  setExitCode: (code) => {
    process.exitCode = code;
  },
  interruption: processInterruption,
};

export function createProgram(
  factory: RuntimeFactory = defaultRuntimeFactory,
  io: ProgramIO = defaultIO,
): CliCommand {
  const program = new CliCommand();

  program
    .name('kube-deploy')
    .description('Start a local cluster and deploy the application with its monitoring stack')
    .option('--config <path>', 'path to the YAML configuration file (default: ./kube-deploy.yaml)')
    .option('--project-root <path>', 'directory holding the application, manifests and overlays')
    .option('--log-level <level>', 'logging level: debug, info, warn, error');

  type Action = (runtime: CliRuntime, logger: Logger) => Promise<boolean>;

  const createOrFallBack = (request: RuntimeRequest): CliRuntime => {
    try {
      return factory(request);
    } catch (error) {
      if (!isApplicationError(error)) throw error;
      request.logger.warn({ code: error.code, ...error.context }, `${error.message}; using the default configuration`);
      return factory({ ...request, defaults: true });
    }
  };

  const execute = async (env: Environment, action: Action, fallbackToDefaults = false) => {
    const globals = program.opts<GlobalOptions>();
    const logger = io.createLogger(globals.logLevel);
    const interruption = io.interruption();
    try {
      const request: RuntimeRequest = { globals, env, logger, signal: interruption.signal };
      const runtime = fallbackToDefaults ? createOrFallBack(request) : factory(request);
      io.setExitCode((await action(runtime, logger)) ? 0 : 1);
    } catch (error) {
      if (isApplicationError(error)) {
        logger.error({ code: error.code, ...error.context }, error.message);
      } else {
        logger.error({ error: errorMessage(error) }, 'Unexpected error');
      }
      io.setExitCode(1);
    } finally {
      interruption.dispose();
    }
  };

  const cluster = program.command('cluster').description('Manage the local cluster runtime');

  cluster
    .command('status')
    .description('report whether the cluster is running')
    .action(() =>
      execute(
        'dev',
        async (runtime, logger) => {
          const running = await runtime.cluster.status();
          logger.info({ running }, `Cluster is ${running ? 'running' : 'not running'}`);
          return true;
        },
        true,
      ),
    );

  cluster
    .command('start')
    .description('start the cluster and wait until it is ready')
    .action(() => execute('dev', (runtime) => runtime.cluster.start()));

  cluster
    .command('stop')
    .description('stop the cluster')
    .action(() => execute('dev', (runtime) => runtime.cluster.stop()));

  cluster
    .command('restart')
    .description('stop, then start the cluster')
    .action(() => execute('dev', (runtime) => runtime.cluster.restart()));

  program
    .command('deploy')
    .description('deploy the application and its monitoring stack')
    .addOption(
      new Option('--env <env>', 'environment overlay to deploy').choices([...ENVIRONMENTS]).default('dev'),
    )
    .option('--skip-build', 'skip building the application and image', false)
    .option('--skip-monitoring', 'skip deploying Prometheus and Grafana', false)
    .option('--port-forward', 'forward local ports after a successful deployment', false)
    .action((options: DeployCliOptions) => {
      const env = EnvironmentSchema.parse(options.env);
      return execute(env, async (runtime) => {
        const run = await runtime.deploy({
          env,
          skipBuild: options.skipBuild ?? false,
          skipMonitoring: options.skipMonitoring ?? false,
          portForward: options.portForward ?? false,
        });
        return run.success;
      });
    });

  return program;
}
