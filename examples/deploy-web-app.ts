/**
 * Example: deploy an app, scale it, then launch a one-off task
 *
 * Runs against the current kubeconfig context. Deployer settings are read
 * from YAML; per-request behaviour comes from flat deployment properties.
 */

import {
  createDeploymentRequest,
  KubernetesAppDeployer,
  KubernetesClientProvider,
  KubernetesPlatformClient,
  KubernetesTaskLauncher,
  loadDeployerProperties,
  loadTaskLauncherProperties,
  logger,
} from '../src/index.js';

const properties = loadDeployerProperties(`
namespace: demo
limits: {memory: 512Mi, cpu: 500m}
tolerations: [{key: dedicated, value: apps, operator: Equal, effect: NoSchedule}]
deployment-labels: team:platform
`);

const client = new KubernetesPlatformClient(new KubernetesClientProvider());
const deployer = new KubernetesAppDeployer({ properties, client });

async function main(): Promise<void> {
  const appId = await deployer.deploy(
    createDeploymentRequest({
      name: 'ticktock',
      resource: 'docker:ghcr.io/example/ticktock:1.0',
      appProperties: { 'server.port': '8080' },
      deploymentProperties: {
        'deployer.count': '2',
        'deployer.kubernetes.createLoadBalancer': 'true',
        'deployer.kubernetes.probeType': 'TCP',
        'deployer.kubernetes.environmentVariables': "LOG_FORMAT=json,ALLOWED_HOSTS='a.example.com,b.example.com'",
      },
    })
  );
  logger.info('Deployed', { appId, status: await deployer.status(appId) });

  await deployer.scale({ deploymentId: appId, count: 3 });

  const launcher = new KubernetesTaskLauncher({
    properties: { ...properties, createJob: true },
    client,
    taskLauncherProperties: loadTaskLauncherProperties('restart-policy: OnFailure\nbackoff-limit: 2'),
  });
  const taskId = await launcher.launch(
    createDeploymentRequest({
      name: 'migrate',
      resource: 'docker:ghcr.io/example/migrate:1.0',
      commandlineArguments: ['--target=latest'],
    })
  );
  logger.info('Launched task', { taskId, running: await launcher.getRunningTaskExecutionCount() });
}

main().catch((error: unknown) => {
  logger.error('Example failed', error);
  process.exitCode = 1;
});
