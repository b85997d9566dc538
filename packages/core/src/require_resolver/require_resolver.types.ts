import type { ExecCommand } from '../process_runner';
import type { TransportScheme } from '../git';
import type { WorkspaceManager } from '../workspace';
import type { Logger } from '../logger';

/**
 * Dependencies required by RequireResolver
 */
export type RequireResolverDependencies = {
  /** Runs the git client */
  execCommand: ExecCommand;
  /** Allocates one workspace per fetch attempt */
  workspaces: WorkspaceManager;
  /** Git executable (default: "git") */
  gitBinary?: string;
  /** Transports tried in order (default: ssh, then https) */
  transports?: readonly TransportScheme[];
  /** Diagnostics for --verbose; silent when omitted */
  logger?: Logger;
};
