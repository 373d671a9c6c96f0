/**
 * Deployment and task identifiers
 *
 * App ids are derived from the app name and group alone, so the same request
 * always maps to the same objects. Task ids carry a random suffix so repeated
 * launches of one task never collide.
 */

import { customAlphabet } from 'nanoid';
import {
  APP_ID_LABEL,
  APP_NAME_LABEL,
  DEPLOYMENT_ID_LABEL,
  GROUP_ID_LABEL,
} from '../constants/labels.js';
import { hasText } from '../properties/index.js';
import {
  APP_NAME_PROPERTY_KEY,
  type DeploymentRequest,
  GROUP_PROPERTY_KEY,
} from '../types/deployment.js';

const TASK_SUFFIX_ALPHABET = 'abcdefghijklmnopqrstuvwxyz1234567890';
const TASK_SUFFIX_LENGTH = 10;

const taskSuffix = customAlphabet(TASK_SUFFIX_ALPHABET, TASK_SUFFIX_LENGTH);

/**
 * Object names may not contain dots or upper-case letters
 */
export function toPlatformName(name: string): string {
  return name.replace(/\./g, '-').toLowerCase();
}

export function createDeploymentId(request: DeploymentRequest): string {
  const groupId = request.deploymentProperties[GROUP_PROPERTY_KEY];
  const name = request.definition.name;
  return toPlatformName(groupId === undefined ? name : `${groupId}-${name}`);
}

export function createTaskId(request: DeploymentRequest, suffix: string = taskSuffix()): string {
  return toPlatformName(`${request.definition.name}-${suffix}`);
}

/**
 * Labels that identify every object belonging to one deployment
 */
export function createIdMap(appId: string, request: DeploymentRequest): Record<string, string> {
  const idMap: Record<string, string> = { [APP_ID_LABEL]: appId };
  const groupId = request.deploymentProperties[GROUP_PROPERTY_KEY];
  if (groupId !== undefined) {
    idMap[GROUP_ID_LABEL] = groupId;
  }
  idMap[DEPLOYMENT_ID_LABEL] = appId;
  const appName = request.deploymentProperties[APP_NAME_PROPERTY_KEY];
  if (hasText(appName)) {
    idMap[APP_NAME_LABEL] = appName;
  }
  return idMap;
}

/**
 * `{a: '1', b: '2'}` → `a=1,b=2`; a label given without a value selects on its presence
 */
export function toLabelSelector(labels: Readonly<Record<string, string | undefined>>): string {
  return Object.entries(labels)
    .map(([key, value]) => (value === undefined ? key : `${key}=${value}`))
    .join(',');
}
