import { confirm } from '@inquirer/prompts';
import { ui } from './ui.js';
import { ErrorUtils } from './utils/security.js';

/**
 * Custom error class for user-initiated cancellation events.
 *
 * This error is thrown when the user cancels operations through:
 * - Ctrl+C (SIGINT) while a prompt is open
 * - Declining to replace an existing repository with a template
 *
 * @extends Error
 */
export class UserCancelledError extends Error {
  constructor(message = 'Operation cancelled by user') {
    super(message);
    this.name = 'UserCancelledError';
  }
}

/**
 * Asks before a template replaces the history of an existing repository.
 *
 * @throws {UserCancelledError} When the user declines or closes the prompt
 */
export async function confirmTemplateOverwrite(root: string): Promise<void> {
  ui.existingRepository(root);

  let confirmed: boolean;
  try {
    confirmed = await confirm({
      message: 'Replace the existing history with the template?',
      default: false
    });
  } catch (error) {
    if (error instanceof Error &&
        (error.name === 'ExitPromptError' || error.message.includes('User force closed'))) {
      throw new UserCancelledError('Operation cancelled by user (Ctrl+C)');
    }
    throw error;
  }

  if (!confirmed) {
    throw new UserCancelledError('Template initialization cancelled by user');
  }
}

/**
 * Reports a failed run and exits.
 *
 * - UserCancelledError: exit code 0
 * - Anything else: the error's message, exit code 1
 */
export function handleInitError(error: unknown): never {
  console.log(''); // Add spacing

  if (error instanceof UserCancelledError) {
    ui.userCancelled();
    process.exit(0);
  }

  ui.error(`❌ ${ErrorUtils.extractErrorMessage(error)}`);
  process.exit(1);
}
