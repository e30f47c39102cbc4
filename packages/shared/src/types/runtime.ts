/**
 * Container runtime adapter contract
 * The rollback core drives containers only through this interface.
 */

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export interface RuntimeAdapter {
  readonly name: string;

  /** Services currently defined */
  listServices(): Promise<string[]>;

  /** Image reference the service's container is running */
  getImage(service: string): Promise<string>;

  isRunning(service: string): Promise<boolean>;

  stop(service: string): Promise<boolean>;

  start(service: string): Promise<boolean>;

  /** Pin the service to an image reference; takes effect on next start */
  restoreImage(service: string, image: string): Promise<boolean>;

  /** Named volumes mounted by the given services */
  listVolumes(services: string[]): Promise<string[]>;

  exportVolume(volume: string, destPath: string): Promise<boolean>;

  /** Destructive: clears the volume before extracting */
  importVolume(volume: string, srcPath: string): Promise<boolean>;

  /** Run a command inside the service's container */
  exec?(service: string, command: string[]): Promise<CommandResult>;

  /** Deliver a signal to the service's main process */
  signal?(service: string, signal: string): Promise<boolean>;
}
