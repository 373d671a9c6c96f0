export {
  type ContainerConfiguration,
  type ContainerFactory,
  createCommandArgs,
  DefaultContainerFactory,
  getExternalPort,
  getImage,
  toShellVariableName,
} from './container-factory.js';
export {
  createIndexProviderContainer,
  PodSpecBuilder,
  type PodSpecOptions,
  type WorkloadKind,
  withIndexedTopology,
} from './pod-spec-builder.js';
