/**
 * Label keys and well-known names stamped onto every object the deployer creates.
 * Lookups, deletes and status queries select on these, never on remembered names.
 */

export const APP_ID_LABEL = 'kubelaunch-app-id';
export const GROUP_ID_LABEL = 'kubelaunch-group-id';
export const DEPLOYMENT_ID_LABEL = 'kubelaunch-deployment-id';
export const APP_NAME_LABEL = 'kubelaunch-application-name';

export const MARKER_LABEL = 'role';
export const MARKER_VALUE = 'kubelaunch-app';

export const TASK_NAME_LABEL = 'task-name';
export const JOB_NAME_LABEL = 'job-name';

/** Env var holding the pod's own UID */
export const APPLICATION_GUID_ENV = 'KUBELAUNCH_APPLICATION_GUID';

export const SERVER_PORT_KEY = 'server.port';
export const DEFAULT_EXTERNAL_PORT = 8080;

export const INDEX_PROVIDER_CONTAINER = 'index-provider';
export const CONFIG_VOLUME = 'config';
export const CONFIG_MOUNT_PATH = '/config';
