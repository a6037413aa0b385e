import { ErrorCode, TierlinkError } from "@tierlink/core";

export class PrivilegeError extends TierlinkError {
  constructor(command: string) {
    super(`"${command}" must run as root (use --dry-run to preview)`, ErrorCode.PERMISSION_DENIED, {
      context: { command },
    });
    this.name = "PrivilegeError";
  }
}

/**
 * Commands that change or dump live state need uid 0; a dry run never does.
 */
export function requireRoot(command: string, uid: number | undefined, dryRun: boolean): void {
  if (!dryRun && uid !== 0) {
    throw new PrivilegeError(command);
  }
}
