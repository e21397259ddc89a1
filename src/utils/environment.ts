/**
 * Environment detection used to decide whether the CLI may prompt.
 */
export class EnvironmentUtils {
  /**
   * Checks if the application is running in a test environment.
   *
   * This method checks for common test environment indicators:
   * - NODE_ENV === 'test' (standard Node.js test environment)
   * - VITEST environment variables (Vitest test runner)
   */
  static isTestEnvironment(): boolean {
    return (
      process.env.NODE_ENV === 'test' ||
      !!process.env.VITEST ||
      !!process.env.CI_TEST_MODE
    );
  }

  /**
   * Checks if the application is running in a CI/CD environment.
   */
  static isCiEnvironment(): boolean {
    return (
      !!process.env.CI ||
      !!process.env.GITHUB_ACTIONS ||
      !!process.env.GITLAB_CI ||
      !!process.env.CIRCLECI ||
      !!process.env.JENKINS_URL ||
      !!process.env.TRAVIS
    );
  }

  /**
   * True when a human can answer prompts: stdin is a TTY and
   * we are neither under test nor in CI.
   */
  static isInteractive(): boolean {
    return (
      !!process.stdin.isTTY &&
      !this.isTestEnvironment() &&
      !this.isCiEnvironment()
    );
  }
}
