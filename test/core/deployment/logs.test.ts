import { describe, expect, it } from 'vitest';
import { createRuntimeEnvironmentInfo } from '../../../src/core/deployment/environment-info.js';
import { reverseLogLines } from '../../../src/core/deployment/logs.js';

describe('reverseLogLines', () => {
  it('should put most-recent-first lines back in order', () => {
    expect(reverseLogLines('foo\nbar\nbaz\nboo')).toBe('boo\nbaz\nbar\nfoo');
  });

  it('should leave a single line alone', () => {
    expect(reverseLogLines('only')).toBe('only');
  });
});

describe('createRuntimeEnvironmentInfo', () => {
  it('should describe the platform', () => {
    const info = createRuntimeEnvironmentInfo({
      spiClass: 'TaskLauncher',
      implementationName: 'KubernetesTaskLauncher',
      namespace: 'jobs',
    });

    expect(info).toEqual({
      spiClass: 'TaskLauncher',
      implementationName: 'KubernetesTaskLauncher',
      implementationVersion: '0.1.0',
      platformType: 'Kubernetes',
      platformApiVersion: 'v1',
      platformClientVersion: '@kubernetes/client-node@1',
      platformHostVersion: 'unknown',
      nodeVersion: process.versions.node,
      platformSpecificInfo: { namespace: 'jobs', 'master-url': 'unknown' },
    });
  });
});
