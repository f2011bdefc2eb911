/**
 * Process and kubectl transport
 * @module @faultline/core/transport
 */

export {
  ProcessCommandRunner,
  type CommandRunner,
  type CommandResult,
  type CommandOptions,
} from './command-runner';

export {
  KubectlClient,
  isTransientFailure,
  isAmbiguousFailure,
  describeFailure,
  succeeded,
  type ResourceRef,
} from './kubectl-client';
