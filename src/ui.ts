import pc from 'picocolors';

/**
 * Centralized UI messaging utilities for consistent CLI experience
 */
export const ui = {
  // Status messages
  error: (message: string) => console.log(pc.red(message)),
  warning: (message: string) => console.log(pc.yellow(message)),
  info: (message: string) => console.log(pc.gray(message)),

  // Common message patterns
  initializing: (root: string) =>
    console.log(`Initializing ${pc.bold(root)}...`),

  initializingFrom: (root: string, url: string) =>
    console.log(`Initializing ${pc.bold(root)} from ${pc.cyan(url)}...`),

  installing: (name: string, url: string) =>
    console.log(pc.gray(`Installing ${name} from ${url}`)),

  forceNonEmpty: () =>
    ui.warning('Target directory is not empty, but `--force` was specified'),

  dependencyExists: (path: string) =>
    ui.warning(`"${path}" already exists, skipping install...`),

  existingRepository: (root: string) =>
    ui.warning(`⚠️  ${root} is already a git repository; its history will be replaced by the template`),

  userCancelled: () => {
    ui.warning('⚠️  Operation cancelled by user');
  },

  // Final messages
  initialized: () => console.log(pc.green('    Initialized contract project'))
} as const;
