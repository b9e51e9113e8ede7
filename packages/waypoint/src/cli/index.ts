#!/usr/bin/env node
/**
 * Waypoint CLI entry point.
 */

import { parse } from './parser.ts';
import { getHelp, getVersion } from './help.ts';
import { executeValidate } from './commands/validate.ts';
import { executeRoute } from './commands/route.ts';
import { executeWalk } from './commands/walk.ts';
import { executeList } from './commands/list.ts';
import { match } from '../result.ts';
import type { Command } from '../types.ts';

const runCommand = async (command: Command): Promise<number> => {
  switch (command.command) {
    case 'help':
      console.log(getHelp(command.subcommand));
      return 0;

    case 'version':
      console.log(`waypoint v${getVersion()}`);
      return 0;

    case 'validate':
      return executeValidate(command);

    case 'route':
      return executeRoute(command);

    case 'walk':
      return executeWalk(command);

    case 'list':
      return executeList(command);

    default: {
      const exhaustive: never = command;
      return exhaustive;
    }
  }
};

const main = async (): Promise<void> => {
  const result = parse(process.argv);

  const exitCode = await match(result, {
    ok: runCommand,
    err: (error) => {
      console.error(`Error: ${error.message}`);
      if (error.code === 'UNKNOWN_COMMAND') {
        console.error(`Run 'waypoint --help' for usage information.`);
      }
      return Promise.resolve(1);
    },
  });

  process.exitCode = exitCode;
};

main().catch((e: unknown) => {
  console.error(e instanceof Error ? e.message : e);
  process.exitCode = 1;
});
