/**
 * Command-line argument handling for the chat-relay binary.
 * Kept free of side effects so the parsing can be tested directly.
 */

import { parseArgs } from 'node:util';

export const USAGE = `
chat-relay - browser chat over an OpenAI-compatible completion endpoint

Usage:
  chat-relay [options]

Options:
  -c, --config <path>   Path to a YAML settings file (sets CONFIG_PATH)
  -p, --port <port>     Port to listen on (sets PORT)
  --init                Create config/settings.yaml from the example
  -h, --help            Show this help message

Examples:
  LLM_API_KEY=... chat-relay                # Run with environment settings
  chat-relay --config ./config/settings.yaml
  chat-relay --init
`;

export type CliCommand =
  | { kind: 'help' }
  | { kind: 'init' }
  | { kind: 'run'; env: Record<string, string> };

/**
 * Work out what the binary should do.
 * @param argv - Arguments after the script name.
 * @returns The command, with the environment overrides for `run`.
 */
export function parseCliArgs(argv: string[]): CliCommand {
  const { values } = parseArgs({
    args: argv,
    options: {
      config: { type: 'string', short: 'c' },
      port: { type: 'string', short: 'p' },
      init: { type: 'boolean' },
      help: { type: 'boolean', short: 'h' },
    },
    strict: false, // Allow unknown args to pass through
  });

  if (values.help === true) return { kind: 'help' };
  if (values.init === true) return { kind: 'init' };

  const env: Record<string, string> = {};
  if (typeof values.config === 'string') env['CONFIG_PATH'] = values.config;
  if (typeof values.port === 'string') env['PORT'] = values.port;

  return { kind: 'run', env };
}
