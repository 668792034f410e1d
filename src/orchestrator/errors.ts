/** A chain that cannot run as written. Raised before any step is invoked. */
export class ChainConfigError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length ? `${message}: ${issues.join("; ")}` : message);
    this.name = "ChainConfigError";
    this.issues = issues;
  }
}
