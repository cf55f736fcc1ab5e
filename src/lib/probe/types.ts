/**
 * How a managed service is identified on the host: by the TCP port it
 * listens on (bare process) or by its container name.
 */
export type Binding = PortBinding | ContainerBinding;

export interface PortBinding {
  kind: 'port';
  port: number;
}

export interface ContainerBinding {
  kind: 'container';

  /** Exact container name */
  name: string;
}

/**
 * A process id (port bindings) or container id (container bindings)
 */
export type InstanceID = string;

export interface Probe {
  /**
   * Every instance currently matching the binding, de-duplicated in
   * discovery order. An empty array means the binding is free.
   */
  find(binding: Binding): Promise<InstanceID[]>;
}

export function describeBinding(binding: Binding): string {
  return binding.kind === 'port'
    ? `port ${binding.port}`
    : `container ${binding.name}`;
}
