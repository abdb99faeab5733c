/**
 * Execution Context Types
 *
 * Type definitions for the context every command handler receives:
 * where the registries live, where packages get installed, and which
 * collaborators perform the side effects.
 */

import type { OutputPort } from '../core/ports/output.js';
import type { Collaborators } from '../core/ports/collaborators.js';

export interface RegistryPaths {
  local: string;
  global: string;
}

export interface InstallPaths {
  prefix: string;
  archPrefix: string;
  globalPrefix: string;
  globalArchPrefix: string;
}

/**
 * ExecutionContext - everything a command needs, passed by reference
 * through the call chain instead of living in process-wide state.
 */
export interface ExecutionContext {
  registryPaths: RegistryPaths;
  installPaths: InstallPaths;

  /**
   * True when the process may write system-wide locations.
   * Decides the target registry when neither --local nor --global is given.
   */
  privileged: boolean;

  /** Parent of the per-operation scratch directories */
  stagingDirectory: string;

  collaborators: Collaborators;

  /**
   * Output port for all user-facing messages.
   * When not provided, defaults to consoleOutput (plain console.log).
   */
  output?: OutputPort;
}

/**
 * Options for creating an ExecutionContext
 */
export interface ExecutionOptions {
  /** Override the privilege detection */
  privileged?: boolean;
  output?: OutputPort;
  /** Replace individual default collaborators */
  collaborators?: Partial<Collaborators>;
}
