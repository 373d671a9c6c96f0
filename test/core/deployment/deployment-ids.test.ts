import * as fc from 'fast-check';
import { describe, expect, it } from 'vitest';
import {
  createDeploymentId,
  createIdMap,
  createTaskId,
  toLabelSelector,
  toPlatformName,
} from '../../../src/core/deployment/deployment-ids.js';
import { createDeploymentRequest } from '../../../src/core/types/deployment.js';

describe('Deployment ids', () => {
  it('should derive the app id from group and name', () => {
    const request = createDeploymentRequest({
      name: 'My.App',
      resource: 'docker:app',
      deploymentProperties: { 'deployer.group': 'Grp' },
    });
    expect(createDeploymentId(request)).toBe('grp-my-app');
  });

  it('should use the name alone without a group', () => {
    expect(createDeploymentId(createDeploymentRequest({ name: 'web', resource: 'docker:web' }))).toBe('web');
  });

  it('should always map the same request to the same id', () => {
    const names = fc.stringMatching(/^[a-zA-Z][a-zA-Z0-9.]{0,20}$/);
    const groups = fc.option(fc.stringMatching(/^[a-z]{1,8}$/), { nil: undefined });
    fc.assert(
      fc.property(names, groups, (name, group) => {
        const deploymentProperties: Record<string, string> =
          group === undefined ? {} : { 'deployer.group': group };
        const init = { name, resource: 'docker:app', deploymentProperties };
        const id = createDeploymentId(createDeploymentRequest(init));
        expect(createDeploymentId(createDeploymentRequest(init))).toBe(id);
        expect(id).toBe(id.toLowerCase());
        expect(id).not.toContain('.');
      })
    );
  });

  it('should give task ids a random lowercase suffix', () => {
    const request = createDeploymentRequest({ name: 'Batch', resource: 'docker:batch' });
    const first = createTaskId(request);
    expect(first).toMatch(/^batch-[a-z0-9]{10}$/);
    expect(createTaskId(request)).not.toBe(first);
    expect(createTaskId(request, 'Fixed')).toBe('batch-fixed');
  });

  it('should normalize platform names', () => {
    expect(toPlatformName('Ticktock.Log')).toBe('ticktock-log');
  });

  it('should label with app, group, deployment and application name', () => {
    const request = createDeploymentRequest({
      name: 'web-v2',
      resource: 'docker:web',
      deploymentProperties: { 'deployer.group': 'shop', 'deployer.appName': 'web' },
    });
    expect(createIdMap('shop-web-v2', request)).toEqual({
      'kubelaunch-app-id': 'shop-web-v2',
      'kubelaunch-group-id': 'shop',
      'kubelaunch-deployment-id': 'shop-web-v2',
      'kubelaunch-application-name': 'web',
    });
  });

  it('should build label selectors, selecting on presence for labels without a value', () => {
    expect(toLabelSelector({ 'kubelaunch-app-id': 'web', 'task-name': undefined })).toBe(
      'kubelaunch-app-id=web,task-name'
    );
  });
});
