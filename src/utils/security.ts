/**
 * Validation for values that end up as git arguments.
 */
export class SecurityValidator {
  /**
   * Dangerous patterns that should be rejected in branch names
   */
  private static readonly DANGEROUS_BRANCH_PATTERNS = [
    /\.\./,           // Path traversal
    /^-/,             // Option injection (branch names starting with -)
    /[\x00-\x1f\x7f]/, // Control characters including null bytes
    /[;&|`$(){}]/,    // Shell metacharacters
    /\s/,             // Whitespace characters
    /@\{/             // Reflog syntax (@{...})
  ];

  /**
   * Validates a template branch name before it is handed to `git fetch`.
   *
   * @param branch - Branch name to validate
   * @returns true if valid (throws on invalid)
   * @throws {Error} When branch name contains dangerous patterns or invalid format
   */
  static validateBranchName(branch: string): boolean {
    const sanitized = branch.trim();

    if (this.DANGEROUS_BRANCH_PATTERNS.some(pattern => pattern.test(sanitized))) {
      throw new Error('Invalid branch name: contains dangerous characters');
    }

    // Must start and end with alphanumeric
    if (!/^[a-zA-Z0-9]([a-zA-Z0-9/_.-]*[a-zA-Z0-9])?$/.test(sanitized)) {
      throw new Error('Invalid branch name format');
    }

    if (sanitized.length > 255) {
      throw new Error('Branch name too long');
    }

    return true;
  }
}

/**
 * Remote URLs are positional arguments to `git fetch`; a leading `-` would be
 * read as an option.
 */
export class RemoteValidator {
  private static readonly DANGEROUS_URL_PATTERNS = [
    /^-/,              // Option injection
    /[\x00-\x1f\x7f]/, // Control characters including null bytes
    /\s/              // Whitespace characters
  ];

  /**
   * @throws {Error} When the URL could be mistaken for an option or contains control characters
   */
  static validateRemoteUrl(url: string): boolean {
    if (this.DANGEROUS_URL_PATTERNS.some(pattern => pattern.test(url))) {
      throw new Error('Invalid remote URL: contains dangerous characters');
    }
    return true;
  }
}

/**
 * Utility functions for consistent error handling across the codebase.
 */
export class ErrorUtils {
  /**
   * Extracts error message from unknown error types consistently.
   */
  static extractErrorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
  }
}
