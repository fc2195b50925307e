/**
 * Deployment Configuration
 *
 * Zod-validated configuration. Values come from the defaults, an optional
 * YAML file and the `environments.<env>` overlay inside that file.
 */

import { z } from 'zod';
import yaml from 'js-yaml';
import { existsSync, readFileSync } from 'node:fs';
import { dirname, isAbsolute, join, resolve } from 'node:path';
import { ConfigurationError, ErrorCodes } from '../errors/index';
import {
  DEFAULT_APP_SELECTOR,
  DEFAULT_BINARIES,
  DEFAULT_CLUSTER,
  DEFAULT_IMAGE,
  DEFAULT_LAYOUT,
  DEFAULT_MONITORED_SERVICES,
  DEFAULT_NAMESPACES,
  DEFAULT_PORT_FORWARDS,
  DEFAULT_RETRIES,
  DEFAULT_TIMEOUTS,
  ENVIRONMENTS,
} from './defaults';

const DurationSchema = z.coerce.number().int().nonnegative();
const PortSchema = z.coerce.number().int().min(1).max(65535);
const NameSchema = z.string().min(1);

export const EnvironmentSchema = z.enum(ENVIRONMENTS);
export type Environment = z.infer<typeof EnvironmentSchema>;

export const ClusterConfigSchema = z.object({
  binary: NameSchema.default(DEFAULT_BINARIES.minikube),
  memoryMb: z.coerce.number().int().positive().default(DEFAULT_CLUSTER.memoryMb),
  cpus: z.coerce.number().int().positive().default(DEFAULT_CLUSTER.cpus),
  driver: NameSchema.default(DEFAULT_CLUSTER.driver),
  statusTimeoutMs: DurationSchema.default(DEFAULT_TIMEOUTS.statusQuery),
  startTimeoutMs: DurationSchema.default(DEFAULT_TIMEOUTS.clusterStart),
  readyDeadlineMs: DurationSchema.default(DEFAULT_TIMEOUTS.clusterReady),
  pollIntervalMs: DurationSchema.default(DEFAULT_TIMEOUTS.clusterPoll),
  restartDelayMs: DurationSchema.default(DEFAULT_TIMEOUTS.restartDelay),
});

const MonitoredServiceSchema = z.object({
  name: NameSchema,
  manifest: NameSchema,
  selector: NameSchema,
});

const PortForwardSchema = z.object({
  name: NameSchema,
  namespace: NameSchema,
  resource: NameSchema,
  localPort: PortSchema,
  remotePort: PortSchema,
  note: z.string().optional(),
});

const TimeoutsSchema = z.object({
  namespaceRenderMs: DurationSchema.default(DEFAULT_TIMEOUTS.namespaceRender),
  namespaceApplyMs: DurationSchema.default(DEFAULT_TIMEOUTS.namespaceApply),
  npmStepMs: DurationSchema.default(DEFAULT_TIMEOUTS.npmStep),
  dockerBuildMs: DurationSchema.default(DEFAULT_TIMEOUTS.dockerBuild),
  imageLoadMs: DurationSchema.default(DEFAULT_TIMEOUTS.imageLoad),
  manifestApplyMs: DurationSchema.default(DEFAULT_TIMEOUTS.manifestApply),
  overlayApplyMs: DurationSchema.default(DEFAULT_TIMEOUTS.overlayApply),
  podQueryMs: DurationSchema.default(DEFAULT_TIMEOUTS.podQuery),
  deploymentMs: DurationSchema.default(DEFAULT_TIMEOUTS.deployment),
  deploymentPollMs: DurationSchema.default(DEFAULT_TIMEOUTS.deploymentPoll),
  backoffMs: DurationSchema.default(DEFAULT_TIMEOUTS.backoff),
});

export const DeployConfigSchema = z.object({
  projectRoot: NameSchema.default(() => process.cwd()),
  binaries: z
    .object({
      kubectl: NameSchema.default(DEFAULT_BINARIES.kubectl),
      docker: NameSchema.default(DEFAULT_BINARIES.docker),
      npm: NameSchema.default(DEFAULT_BINARIES.npm),
    })
    .default({}),
  layout: z
    .object({
      appDir: NameSchema.default(DEFAULT_LAYOUT.appDir),
      k8sDir: NameSchema.default(DEFAULT_LAYOUT.k8sDir),
      monitoringDir: NameSchema.default(DEFAULT_LAYOUT.monitoringDir),
    })
    .default({}),
  namespaces: z
    .object({
      app: NameSchema.default(DEFAULT_NAMESPACES.app),
      monitoring: NameSchema.default(DEFAULT_NAMESPACES.monitoring),
    })
    .default({}),
  image: NameSchema.default(DEFAULT_IMAGE),
  appSelector: NameSchema.default(DEFAULT_APP_SELECTOR),
  monitoring: z
    .object({
      services: z
        .array(MonitoredServiceSchema)
        .default(DEFAULT_MONITORED_SERVICES.map((service) => ({ ...service }))),
    })
    .default({}),
  portForwards: z
    .array(PortForwardSchema)
    .default(DEFAULT_PORT_FORWARDS.map((forward) => ({ ...forward }))),
  cluster: ClusterConfigSchema.default({}),
  timeouts: TimeoutsSchema.default({}),
  retries: z
    .object({
      apply: z.coerce.number().int().positive().default(DEFAULT_RETRIES.apply),
    })
    .default({}),
});

export type DeployConfig = z.infer<typeof DeployConfigSchema>;
export type ClusterConfig = z.infer<typeof ClusterConfigSchema>;
export type MonitoredService = z.infer<typeof MonitoredServiceSchema>;

export interface LoadConfigOptions {
  env: Environment;
  /** Explicit configuration file; it must exist */
  configPath?: string;
  projectRoot?: string;
  cwd?: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Merge `overlay` into `base`. Nested objects merge, everything else is replaced.
 */
export function deepMerge(
  base: Record<string, unknown>,
  overlay: Record<string, unknown>,
): Record<string, unknown> {
  const merged: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(overlay)) {
    const existing = merged[key];
    merged[key] = isRecord(existing) && isRecord(value) ? deepMerge(existing, value) : value;
  }
  return merged;
}

function readConfigFile(path: string): Record<string, unknown> {
  let document: unknown;
  try {
    document = yaml.load(readFileSync(path, 'utf-8'));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Cannot read configuration file ${path}: ${message}`, [message]);
  }

  if (document === undefined || document === null) {
    return {};
  }
  if (!isRecord(document)) {
    throw new ConfigurationError(`Configuration file ${path} must contain a mapping`);
  }
  return document;
}

/**
 * Build the configuration for one environment
 */
export function loadConfig(options: LoadConfigOptions): DeployConfig {
  const cwd = options.cwd ?? process.cwd();
  const configPath = options.configPath
    ? resolve(cwd, options.configPath)
    : join(cwd, DEFAULT_LAYOUT.configFile);

  let raw: Record<string, unknown> = {};
  if (existsSync(configPath)) {
    raw = readConfigFile(configPath);
  } else if (options.configPath) {
    throw new ConfigurationError(
      `Configuration file not found: ${configPath}`,
      [],
      ErrorCodes.CONFIG_NOT_FOUND,
    );
  }

  const { environments, ...base } = raw;
  let merged = base;
  if (environments !== undefined) {
    if (!isRecord(environments)) {
      throw new ConfigurationError('environments must be a mapping of environment overlays', [
        'environments: Expected object',
      ]);
    }
    const overlay = environments[options.env];
    if (overlay !== undefined) {
      if (!isRecord(overlay)) {
        throw new ConfigurationError(`environments.${options.env} must be a mapping`, [
          `environments.${options.env}: Expected object`,
        ]);
      }
      merged = deepMerge(base, overlay);
    }
  }

  const rawRoot = options.projectRoot ?? merged.projectRoot;
  if (typeof rawRoot === 'string') {
    const anchor = options.projectRoot !== undefined ? cwd : dirname(configPath);
    merged = { ...merged, projectRoot: isAbsolute(rawRoot) ? rawRoot : resolve(anchor, rawRoot) };
  } else if (rawRoot === undefined) {
    merged = { ...merged, projectRoot: cwd };
  }

  const result = DeployConfigSchema.safeParse(merged);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`Configuration validation failed: ${issues.join('; ')}`, issues);
  }
  return result.data;
}

export interface ProjectLayout {
  appDir: string;
  dockerfile: string;
  k8sDir: string;
  overlayDir: string;
  monitoringDir: string;
}

/**
 * Absolute paths of the artifacts a deployment consumes
 */
export function resolveLayout(config: DeployConfig, env: Environment): ProjectLayout {
  const appDir = resolve(config.projectRoot, config.layout.appDir);
  const k8sDir = resolve(config.projectRoot, config.layout.k8sDir);
  return {
    appDir,
    dockerfile: join(appDir, 'Dockerfile'),
    k8sDir,
    overlayDir: join(k8sDir, 'overlays', env),
    monitoringDir: resolve(config.projectRoot, config.layout.monitoringDir),
  };
}
