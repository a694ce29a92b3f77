import { password as promptPassword } from '@inquirer/prompts';
import { Command, CommanderError } from 'commander';
import { resolveConfig, type StoreConfig } from './config';
import {
  EXIT_CODE_SUCCESS,
  EXIT_CODE_USAGE,
  errorMessage,
  NotFoundError,
  SecretStoreError,
  toExitCode,
} from './errors';
import { addSecret, deleteSecret, getSecret, listServices } from './secrets';

export const VERSION = '0.1.0';

export interface Io {
  out(line: string): void;
  err(line: string): void;
}

export const consoleIo: Io = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

type GlobalOptions = {
  dataFile?: string;
  keyFile?: string;
  debug?: boolean;
};

const configFromCommand = (command: Command): StoreConfig => {
  const { dataFile, keyFile } = command.optsWithGlobals<GlobalOptions>();
  return resolveConfig({ dataFile, keyFile });
};

const isPromptCancellation = (error: unknown): boolean =>
  error instanceof Error &&
  (error.name === 'ExitPromptError' || error.name === 'CancelPromptError' || error.name === 'AbortPromptError');

export type PasswordReader = (service: string) => Promise<string>;

export const promptForPassword: PasswordReader = (service) =>
  promptPassword({
    message: `Password for ${service}`,
    mask: true,
    validate: (input) => (input && input.length >= 1 ? true : 'Password cannot be empty'),
  });

export const createProgram = (io: Io = consoleIo, readPassword: PasswordReader = promptForPassword): Command => {
  const program = new Command();

  program
    .name('sealbox')
    .description('Keep service passwords in a local encrypted store')
    .version(VERSION)
    .option('--data-file <path>', 'Path to the encrypted secrets file')
    .option('--key-file <path>', 'Path to the master key file')
    .option('--debug', 'Show internal error details', false)
    .configureOutput({
      writeOut: (str) => io.out(str.trimEnd()),
      writeErr: (str) => io.err(str.trimEnd()),
    })
    .showHelpAfterError('(run sealbox --help for usage)')
    .exitOverride();

  program
    .command('add')
    .description('Encrypt and store the password for a service')
    .argument('<service>', 'Service name (e.g., github)')
    .argument('[password]', 'Password to store; prompted for when omitted')
    .action(async (service: string, password: string | undefined, _options: unknown, command: Command) => {
      const config = configFromCommand(command);

      let secret = password;
      if (secret === undefined) {
        try {
          secret = await readPassword(service);
        } catch (error) {
          if (isPromptCancellation(error)) {
            io.err('Password prompt cancelled.');
            return;
          }
          throw error;
        }
      }

      const replaced = await addSecret(config, service, secret);
      io.out(`${replaced ? 'Updated' : 'Stored'} secret for ${service.trim()}.`);
    });

  program
    .command('get')
    .description('Decrypt and print the password for a service')
    .argument('<service>', 'Service name')
    .action(async (service: string, _options: unknown, command: Command) => {
      const secret = await getSecret(configFromCommand(command), service);
      io.out(secret);
    });

  program
    .command('delete')
    .description('Remove the password for a service')
    .argument('<service>', 'Service name')
    .action(async (service: string, _options: unknown, command: Command) => {
      const deleted = await deleteSecret(configFromCommand(command), service);
      if (deleted) {
        io.out(`Deleted secret for ${service.trim()}.`);
      } else {
        io.err(`No secret stored for ${service.trim()}.`);
      }
    });

  program
    .command('list')
    .description('List the services with a stored password')
    .action(async (_options: unknown, command: Command) => {
      const services = await listServices(configFromCommand(command));
      for (const service of services) {
        io.out(service);
      }
    });

  return program;
};

const printDetails = (error: unknown, io: Io) => {
  if (error instanceof SecretStoreError && error.details !== undefined) {
    const { details } = error;
    io.err(`Details: ${details instanceof Error ? details.message : JSON.stringify(details, null, 2)}`);
  } else if (error instanceof Error && error.stack) {
    io.err(error.stack);
  }
};

/**
 * Parses `argv` (user arguments only, without the node and script paths), runs
 * the matching command and resolves the process exit status.
 */
export const run = async (
  argv: string[],
  io: Io = consoleIo,
  readPassword: PasswordReader = promptForPassword
): Promise<number> => {
  const program = createProgram(io, readPassword);

  try {
    await program.parseAsync(argv, { from: 'user' });
    return EXIT_CODE_SUCCESS;
  } catch (error) {
    if (error instanceof CommanderError) {
      // help and version also surface here, with exit code 0
      return error.exitCode === 0 ? EXIT_CODE_SUCCESS : EXIT_CODE_USAGE;
    }
    io.err(error instanceof NotFoundError ? error.message : `Error: ${errorMessage(error)}`);
    if (program.opts<GlobalOptions>().debug) {
      printDetails(error, io);
    }
    return toExitCode(error);
  }
};
