/**
 * Kubernetes task launcher
 *
 * A task runs as a bare pod or, with `createJob`, as a job. Either way the
 * object is named after the task id and labelled with the task name, which
 * is what destroy and the running-task count select on.
 */

import type { V1Job, V1Pod } from '@kubernetes/client-node';
import { Job, Pod } from '../../factories/simple/index.js';
import { sanitizeArguments, sanitizeProperties } from '../../utils/argument-sanitizer.js';
import {
  APP_ID_LABEL,
  JOB_NAME_LABEL,
  MARKER_LABEL,
  MARKER_VALUE,
  TASK_NAME_LABEL,
} from '../constants/labels.js';
import { DEFAULT_TASK_LAUNCHER_PROPERTIES } from '../config/deployer-properties.js';
import { DeploymentStateError, PlatformError } from '../errors.js';
import type {
  DeploymentRequest,
  RuntimeEnvironmentInfo,
  TaskLauncher,
  TaskStatus,
} from '../types/deployment.js';
import type { TaskLauncherProperties } from '../types/properties.js';
import { KubernetesDeployerBase, type KubernetesDeployerOptions, nonEmpty } from './base-deployer.js';
import { createIdMap, createTaskId, toLabelSelector } from './deployment-ids.js';
import { LOG_TAIL_LINES } from './logs.js';
import { mapJobLaunchState, mapPodLaunchState } from './status.js';

export interface KubernetesTaskLauncherOptions extends KubernetesDeployerOptions {
  taskLauncherProperties?: TaskLauncherProperties;
}

export class KubernetesTaskLauncher extends KubernetesDeployerBase implements TaskLauncher {
  private readonly taskLauncherProperties: TaskLauncherProperties;
  private launchQueue: Promise<void> = Promise.resolve();

  constructor(options: KubernetesTaskLauncherOptions) {
    super(options, 'task-launcher');
    this.taskLauncherProperties = options.taskLauncherProperties ?? DEFAULT_TASK_LAUNCHER_PROPERTIES;
  }

  /**
   * Launches through one instance run one at a time, so the concurrency check
   * and the create call cannot interleave. Separate instances may still race.
   */
  launch(request: DeploymentRequest): Promise<string> {
    const run = this.launchQueue.then(() => this.launchTask(request));
    // the caller observes a failure through `run`; the queue only needs to move on
    this.launchQueue = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  private async launchTask(request: DeploymentRequest): Promise<string> {
    const taskId = createTaskId(request);
    const log = this.logger.child({ deploymentId: taskId, namespace: this.namespace });

    const status = await this.status(taskId);
    if (status.state !== 'unknown') {
      throw new DeploymentStateError(
        `Task ${taskId} already exists with a state of ${status.state}`,
        taskId
      );
    }

    if ((await this.getRunningTaskExecutionCount()) >= this.getMaximumConcurrentTasks()) {
      throw new DeploymentStateError(
        `Cannot launch task ${request.definition.name}. The maximum concurrent task executions is at its limit [${this.getMaximumConcurrentTasks()}].`,
        taskId
      );
    }

    log.debug('Launching task', {
      commandlineArguments: sanitizeArguments(request.commandlineArguments),
      deploymentProperties: sanitizeProperties(request.deploymentProperties),
      resource: request.resource.uri,
    });

    try {
      await this.createTaskObject(taskId, request);
      return taskId;
    } catch (error) {
      log.error('Launch failed', error);
      throw error;
    }
  }

  /**
   * There is no stop on the platform; cancelling removes the task's objects
   */
  async cancel(taskId: string): Promise<void> {
    this.logger.debug('Cancelling task', { deploymentId: taskId });
    await this.cleanup(taskId);
  }

  async cleanup(taskId: string): Promise<void> {
    try {
      if (this.properties.createJob) {
        await this.deleteJobs(taskId);
      } else {
        await this.deletePods(taskId);
      }
    } catch (error) {
      this.logger.error('Cleanup failed', error, { deploymentId: taskId });
      throw error;
    }
  }

  async destroy(appName: string): Promise<void> {
    for (const taskId of await this.getTaskIds(appName, this.properties.createJob)) {
      await this.cleanup(taskId);
    }
  }

  async status(taskId: string): Promise<TaskStatus> {
    const state = this.properties.createJob
      ? mapJobLaunchState(await this.client.readJob(this.namespace, taskId))
      : mapPodLaunchState(await this.readPod(taskId));

    this.logger.debug('Built task status', { deploymentId: taskId, state });
    return { taskId, state, attributes: {} };
  }

  /**
   * Counts task pods in the running phase, whether or not jobs are used
   */
  async getRunningTaskExecutionCount(): Promise<number> {
    const pods = await this.listTaskPods();
    return pods.filter((pod) => mapPodLaunchState(pod) === 'running').length;
  }

  getMaximumConcurrentTasks(): number {
    return this.properties.maximumConcurrentTasks;
  }

  async getLog(taskId: string): Promise<string> {
    const selector: Record<string, string> = { [APP_ID_LABEL]: taskId };
    if (this.properties.createJob) {
      const job = await this.client.readJob(this.namespace, taskId);
      const jobName = job?.metadata?.name;
      if (!jobName) {
        return '';
      }
      selector[JOB_NAME_LABEL] = jobName;
    }

    const pods = await this.client.listPods(this.namespace, toLabelSelector(selector));
    const logs: string[] = [];
    for (const pod of pods) {
      const podName = pod.metadata?.name;
      if (!podName) {
        continue;
      }
      for (const container of pod.spec?.containers ?? []) {
        logs.push(
          await this.client.readPodLog(this.namespace, podName, {
            container: container.name,
            tailLines: LOG_TAIL_LINES,
          })
        );
      }
    }
    return logs.join('');
  }

  environmentInfo(): RuntimeEnvironmentInfo {
    return this.createEnvironmentInfo('TaskLauncher', 'KubernetesTaskLauncher');
  }

  private async createTaskObject(taskId: string, request: DeploymentRequest): Promise<void> {
    const props = request.deploymentProperties;
    const resolved = this.resolver.resolve(props);
    const restartPolicy = this.resolver.getRestartPolicy(props, this.taskLauncherProperties.restartPolicy);
    if (this.properties.createJob && restartPolicy === 'Always') {
      throw new DeploymentStateError(
        "RestartPolicy should not be 'Always' when the JobSpec is used.",
        taskId
      );
    }

    const idMap = createIdMap(taskId, request);
    const taskName = request.definition.name;
    const podLabels = {
      [TASK_NAME_LABEL]: taskName,
      [MARKER_LABEL]: MARKER_VALUE,
      ...resolved.deploymentLabels,
      ...idMap,
    };
    const podAnnotations = nonEmpty({ ...resolved.jobAnnotations, ...resolved.podAnnotations });
    const podSpec = this.createPodSpec(request, resolved, {
      appId: taskId,
      workload: 'task',
      restartPolicy,
    });

    if (this.properties.createJob) {
      this.logger.debug('Launching job for task', { deploymentId: taskId });
      await this.client.createJob(
        this.namespace,
        Job({
          name: taskId,
          labels: { [TASK_NAME_LABEL]: taskName, ...idMap },
          annotations: nonEmpty(resolved.jobAnnotations),
          template: { labels: podLabels, annotations: podAnnotations, spec: podSpec },
          backoffLimit: this.resolver.getBackoffLimit(props, this.taskLauncherProperties.backoffLimit),
          ttlSecondsAfterFinished: this.resolver.getTtlSecondsAfterFinished(
            props,
            this.taskLauncherProperties.ttlSecondsAfterFinished
          ),
        })
      );
    } else {
      this.logger.debug('Launching pod for task', { deploymentId: taskId });
      await this.client.createPod(
        this.namespace,
        Pod({ name: taskId, labels: podLabels, annotations: podAnnotations, spec: podSpec })
      );
    }
  }

  private async readPod(taskId: string): Promise<V1Pod | undefined> {
    const pods = await this.client.listPods(
      this.namespace,
      toLabelSelector({ [APP_ID_LABEL]: taskId })
    );
    return pods.find((pod) => pod.metadata?.name === taskId);
  }

  private listTaskPods(taskName?: string): Promise<V1Pod[]> {
    return this.client.listPods(this.namespace, toLabelSelector({ [TASK_NAME_LABEL]: taskName }));
  }

  /**
   * Names of the task objects, or none when they cannot be listed
   */
  private async getTaskIds(taskName: string | undefined, jobs: boolean): Promise<string[]> {
    try {
      const items: Array<V1Job | V1Pod> = jobs
        ? await this.client.listJobs(this.namespace, toLabelSelector({ [TASK_NAME_LABEL]: taskName }))
        : await this.listTaskPods(taskName);
      return items.flatMap((item) => (item.metadata?.name ? [item.metadata.name] : []));
    } catch (error) {
      if (!(error instanceof PlatformError)) {
        throw error;
      }
      this.logger.warn('Failed to list task objects', { taskName, error: error.message });
      return [];
    }
  }

  private async deleteJobs(taskId: string): Promise<void> {
    const jobs = await this.client.listJobs(this.namespace, toLabelSelector({ [APP_ID_LABEL]: taskId }));
    if (jobs.length === 0) {
      this.logger.warn(`Cannot delete job for task "${taskId}" (reason: job does not exist)`);
      return;
    }
    for (const job of jobs) {
      if (job.metadata?.name) {
        this.logger.debug('Deleting job for task', { deploymentId: taskId, job: job.metadata.name });
        await this.client.deleteJob(this.namespace, job.metadata.name);
      }
    }
  }

  private async deletePods(taskId: string): Promise<void> {
    const pods = await this.client.listPods(this.namespace, toLabelSelector({ [APP_ID_LABEL]: taskId }));
    if (pods.length === 0) {
      this.logger.warn(`Cannot delete pod for task "${taskId}" (reason: pod does not exist)`);
      return;
    }
    for (const pod of pods) {
      if (pod.metadata?.name) {
        this.logger.debug('Deleting pod for task', { deploymentId: taskId, pod: pod.metadata.name });
        await this.client.deletePod(this.namespace, pod.metadata.name);
      }
    }
  }
}
