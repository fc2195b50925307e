/**
 * Deployment Workflow Unit Tests
 * Runs the full stage plan against a temporary project layout and a scripted runner
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { DeployConfigSchema, resolveLayout, type DeployConfig } from '../../../src/config/app-config';
import { ErrorCodes } from '../../../src/errors/index';
import { PortForwardSession } from '../../../src/infrastructure/port-forward';
import { ReadinessPoller } from '../../../src/infrastructure/readiness-poller';
import { DEPLOYMENT_INTERRUPTED } from '../../../src/workflows/deployment-pipeline';
import {
  planDeployment,
  resolvePortForwards,
  runDeployment,
  type DeploymentDependencies,
} from '../../../src/workflows/deployment';
import type { DeployOptions, StageContext } from '../../../src/workflows/types';
import type { RetryOutcome } from '../../../src/domain/types/command';
import { ScriptedRunner, createFakeClock, failed, ok } from '../../__support__/fakes';
import { createFakeSpawn, type SpawnCall } from '../../__support__/fake-process';
import { createSilentLogger } from '../../__support__/logger';

const options = (overrides: Partial<DeployOptions> = {}): DeployOptions => ({
  env: 'dev',
  skipBuild: false,
  skipMonitoring: false,
  portForward: false,
  ...overrides,
});

const renderedNamespace = (namespace: string): string =>
  `apiVersion: v1\nkind: Namespace\nmetadata:\n  name: ${namespace}`;

/**
 * A cluster where every command succeeds and every pod is running, unless
 * an override answers the command line first
 */
function healthyCluster(overrides: (line: string) => RetryOutcome | undefined = () => undefined) {
  return new ScriptedRunner((line, command) => {
    const override = overrides(line);
    if (override) return override;

    const namespace = /^kubectl create namespace (\S+)/.exec(line);
    if (namespace?.[1]) return ok(renderedNamespace(namespace[1]));
    if (line === 'kubectl apply -f -') return ok(`namespace/${command.input?.split('name: ')[1] ?? ''} created`);
    if (line.startsWith('kubectl get pods')) return ok('Running');
    return ok();
  });
}

describe('Deployment workflow', () => {
  let projectRoot: string;
  let config: DeployConfig;

  beforeEach(() => {
    projectRoot = mkdtempSync(join(tmpdir(), 'kube-deploy-'));
    mkdirSync(join(projectRoot, 'sre-react-app'));
    writeFileSync(join(projectRoot, 'sre-react-app', 'Dockerfile'), 'FROM nginx:alpine\n');
    mkdirSync(join(projectRoot, 'kubernetes', 'overlays', 'dev'), { recursive: true });
    mkdirSync(join(projectRoot, 'monitoring'));
    writeFileSync(join(projectRoot, 'monitoring', 'prometheus-k8s.yaml'), 'kind: Deployment\n');
    writeFileSync(join(projectRoot, 'monitoring', 'grafana-k8s.yaml'), 'kind: Deployment\n');
    config = DeployConfigSchema.parse({ projectRoot });
  });

  afterEach(() => {
    rmSync(projectRoot, { recursive: true, force: true });
  });

  function setup(runner: ScriptedRunner, running = true, signal?: AbortSignal) {
    const logger = createSilentLogger();
    const clock = createFakeClock();
    const fakeSpawn = createFakeSpawn();
    const deps: DeploymentDependencies = {
      logger,
      runner,
      poller: new ReadinessPoller(logger, runner, { ...clock, signal }),
      cluster: { status: async () => running },
      portForwards: new PortForwardSession(logger, { spawn: fakeSpawn.spawn }),
      config,
    };
    return { deps, clock, spawnCalls: fakeSpawn.calls };
  }

  function context(runner: ScriptedRunner): StageContext {
    const { deps } = setup(runner);
    return { ...deps, layout: resolveLayout(config, 'dev'), env: 'dev' };
  }

  describe('runDeployment', () => {
    it('should run every stage in order against the cluster', async () => {
      const runner = healthyCluster();
      const { deps } = setup(runner);

      const run = await runDeployment(options(), deps);

      expect(run.success).toBe(true);
      expect(run.state).toBe('completed');
      expect(run.stages.map((stage) => stage.name)).toEqual([
        'namespaces',
        'build-app',
        'build-image',
        'monitoring',
        'application',
      ]);
      expect(runner.commandLines).toEqual([
        'kubectl create namespace react-sre-app --dry-run=client -o yaml',
        'kubectl apply -f -',
        'kubectl create namespace monitoring --dry-run=client -o yaml',
        'kubectl apply -f -',
        'npm install --legacy-peer-deps',
        'npm run build',
        'docker build -t react-sre-app:latest .',
        'minikube image load react-sre-app:latest',
        `kubectl apply -f ${join(projectRoot, 'monitoring', 'prometheus-k8s.yaml')}`,
        `kubectl apply -f ${join(projectRoot, 'monitoring', 'grafana-k8s.yaml')}`,
        'kubectl get pods -n monitoring -l app=prometheus -o jsonpath={.items[0].status.phase}',
        'kubectl get pods -n monitoring -l app=grafana -o jsonpath={.items[0].status.phase}',
        `kubectl apply -k ${join(projectRoot, 'kubernetes', 'overlays', 'dev')}`,
        'kubectl get pods -n react-sre-app -l app=react-sre-app -o jsonpath={.items[*].status.phase}',
      ]);
    });

    it('should pipe the rendered namespace manifest to kubectl apply', async () => {
      const runner = healthyCluster();
      const { deps } = setup(runner);

      await runDeployment(options({ skipBuild: true, skipMonitoring: true }), deps);

      const applies = runner.commands.filter((command) => command.args.join(' ') === 'apply -f -');
      expect(applies.map((command) => command.input)).toEqual([
        renderedNamespace('react-sre-app'),
        renderedNamespace('monitoring'),
      ]);
    });

    it('should build in the application directory', async () => {
      const runner = healthyCluster();
      const { deps } = setup(runner);

      await runDeployment(options({ skipMonitoring: true }), deps);

      const npmInstall = runner.commands.find((command) => command.executable === 'npm');
      expect(npmInstall?.cwd).toBe(join(projectRoot, 'sre-react-app'));
      expect(npmInstall?.timeoutMs).toBe(300_000);
    });

    it('should abort without running any command when the cluster is not running', async () => {
      const runner = healthyCluster();
      const { deps } = setup(runner, false);

      const run = await runDeployment(options(), deps);

      expect(run.state).toBe('aborted');
      expect(run.stages).toEqual([]);
      expect(runner.commands).toEqual([]);
    });

    it('should stop at a missing Dockerfile', async () => {
      rmSync(join(projectRoot, 'sre-react-app', 'Dockerfile'));
      const runner = healthyCluster();
      const { deps } = setup(runner);
      const dockerfile = join(projectRoot, 'sre-react-app', 'Dockerfile');

      const run = await runDeployment(options(), deps);

      expect(run.state).toBe('aborted');
      expect(run.stages[2]).toEqual(
        expect.objectContaining({
          name: 'build-image',
          status: 'failed',
          code: ErrorCodes.PREREQUISITE_NOT_MET,
          error: `Dockerfile not found: ${dockerfile}`,
        }),
      );
      expect(run.abortReason).toBe(`Stage build-image failed: Dockerfile not found: ${dockerfile}`);
      expect(runner.commandLines.some((line) => line.startsWith('docker'))).toBe(false);
      expect(runner.commandLines.some((line) => line.startsWith('kubectl apply -k'))).toBe(false);
    });

    it('should abort when a namespace cannot be rendered', async () => {
      const runner = healthyCluster((line) =>
        line.startsWith('kubectl create namespace monitoring') ? failed('forbidden') : undefined,
      );
      const { deps } = setup(runner);

      const run = await runDeployment(options(), deps);

      expect(run.abortReason).toBe(
        'Stage namespaces failed: Failed to generate namespace YAML for monitoring: forbidden',
      );
      expect(runner.commandLines).toHaveLength(3);
    });

    it('should deploy the application even when monitoring is not ready', async () => {
      const runner = healthyCluster((line) => (line.includes('-l app=grafana') ? ok('Pending') : undefined));
      const { deps, clock } = setup(runner);

      const run = await runDeployment(options({ skipBuild: true }), deps);

      expect(run.state).toBe('completed');
      expect(run.success).toBe(false);
      expect(run.stages.find((stage) => stage.name === 'monitoring')?.error).toBe(
        'Monitoring services not ready: grafana',
      );
      expect(run.stages.find((stage) => stage.name === 'application')?.status).toBe('succeeded');
      expect(clock.now()).toBe(300_000);
    });

    it('should retry a failing monitoring manifest apply', async () => {
      const prometheus = `kubectl apply -f ${join(projectRoot, 'monitoring', 'prometheus-k8s.yaml')}`;
      const runner = healthyCluster((line) => (line === prometheus ? failed('connection refused') : undefined));
      const { deps } = setup(runner);

      await runDeployment(options({ skipBuild: true }), deps);

      const apply = runner.commands.find((command) => command.args[2]?.endsWith('prometheus-k8s.yaml'));
      expect(apply?.maxRetries).toBe(3);
      expect(apply?.backoffMs).toBe(5000);
    });

    it('should fail when the application pods are not all running', async () => {
      const runner = healthyCluster((line) =>
        line.includes('-l app=react-sre-app') ? ok('Running Pending') : undefined,
      );
      const { deps } = setup(runner);

      const run = await runDeployment(options({ skipBuild: true, skipMonitoring: true }), deps);

      expect(run.state).toBe('aborted');
      expect(run.abortReason).toBe('Stage application failed: Application not ready after 300s');
    });

    it('should hold port forwards until interrupted', async () => {
      const controller = new AbortController();
      const runner = healthyCluster();
      const { deps } = setup(runner);
      const calls: SpawnCall[] = [];
      const fakeSpawn = createFakeSpawn((_child, call) => {
        calls.push(call);
        if (calls.length === 3) controller.abort();
      });
      deps.portForwards = new PortForwardSession(deps.logger, { spawn: fakeSpawn.spawn });

      const run = await runDeployment(options({ portForward: true }), deps, controller.signal);

      expect(run.success).toBe(true);
      expect(fakeSpawn.calls.map((call) => call.args.slice(1, 3))).toEqual([
        ['svc/dev-react-sre-app', '3000:80'],
        ['svc/prometheus', '9090:9090'],
        ['svc/grafana', '8081:3000'],
      ]);
      expect(fakeSpawn.calls.every((call) => call.child.signals.includes('SIGTERM'))).toBe(true);
    });

    it('should stop waiting for the rollout and skip port forwarding when interrupted', async () => {
      const controller = new AbortController();
      const runner = healthyCluster((line) => {
        if (!line.startsWith('kubectl get pods')) return undefined;
        controller.abort();
        return ok('Pending');
      });
      const { deps, clock, spawnCalls } = setup(runner, true, controller.signal);

      const run = await runDeployment(
        options({ skipBuild: true, skipMonitoring: true, portForward: true }),
        deps,
        controller.signal,
      );

      expect(run.success).toBe(false);
      expect(run.abortReason).toBe(DEPLOYMENT_INTERRUPTED);
      expect(runner.commandLines.filter((line) => line.startsWith('kubectl get pods'))).toHaveLength(1);
      expect(clock.now()).toBe(10_000);
      expect(spawnCalls).toHaveLength(0);
    });

    it('should run no command when interrupted before it starts', async () => {
      const controller = new AbortController();
      controller.abort();
      const runner = healthyCluster();
      const { deps, spawnCalls } = setup(runner, true, controller.signal);

      const run = await runDeployment(options({ portForward: true }), deps, controller.signal);

      expect(run.state).toBe('aborted');
      expect(run.abortReason).toBe(DEPLOYMENT_INTERRUPTED);
      expect(runner.commandLines).toEqual([]);
      expect(spawnCalls).toHaveLength(0);
    });

    it('should not port forward after a failed deployment', async () => {
      const runner = healthyCluster();
      const { deps, spawnCalls } = setup(runner, false);

      await runDeployment(options({ portForward: true }), deps);

      expect(spawnCalls).toHaveLength(0);
    });
  });

  describe('planDeployment', () => {
    const names = (overrides: Partial<DeployOptions>): string[] =>
      planDeployment(options(overrides), context(healthyCluster())).map((stage) => stage.name);

    it('should honour the skip flags', () => {
      expect(names({ skipBuild: true })).toEqual(['namespaces', 'monitoring', 'application']);
      expect(names({ skipMonitoring: true })).toEqual(['namespaces', 'build-app', 'build-image', 'application']);
      expect(names({ skipBuild: true, skipMonitoring: true })).toEqual(['namespaces', 'application']);
    });

    it('should make only monitoring soft', () => {
      const stages = planDeployment(options(), context(healthyCluster()));

      expect(stages.filter((stage) => stage.policy === 'soft').map((stage) => stage.name)).toEqual(['monitoring']);
    });
  });

  describe('resolvePortForwards', () => {
    it('should substitute the environment into resource names', () => {
      expect(resolvePortForwards(config, 'prod').map((forward) => forward.resource)).toEqual([
        'svc/prod-react-sre-app',
        'svc/prometheus',
        'svc/grafana',
      ]);
    });
  });
});
