export type {
  Binding,
  PortBinding,
  ContainerBinding,
  InstanceID,
  Probe,
} from './types';
export { describeBinding } from './types';
export { ProbeFailedError } from './errors';
export {
  SystemProbe,
  parseContainerList,
  parseIDList,
} from './system-probe';
