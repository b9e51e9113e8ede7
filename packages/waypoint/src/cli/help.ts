/**
 * Help text generation for CLI commands.
 */

const VERSION = '0.1.0';

const MAIN_HELP = `
waypoint v${VERSION}
Scene graph navigation for UI tests: declare screens once, route between them.

USAGE:
  waypoint <command> [options]

COMMANDS:
  validate <file>       Check a graph definition for declaration errors
  route <file>          Show the route between two scenes
  walk <file>           Visit every scene in a browser and screenshot it
  list [dir]            List graph files
  version               Show version

OPTIONS:
  -h, --help            Show help
  -v, --version         Show version

Run 'waypoint <command> --help' for command-specific help.
`.trim();

const VALIDATE_HELP = `
waypoint validate - Check a graph definition

USAGE:
  waypoint validate <graph-file>

ARGUMENTS:
  <graph-file>          Path to graph definition file

Builds the graph without a browser and reports its scenes, edges and any
scene the initial scene cannot reach.
`.trim();

const ROUTE_HELP = `
waypoint route - Show the route between two scenes

USAGE:
  waypoint route <graph-file> --to <scene> [options]

ARGUMENTS:
  <graph-file>          Path to graph definition file

OPTIONS:
  -t, --to <scene>      Destination scene (required)
  --from <scene>        Starting scene (default: the initial scene)
  -h, --help            Show this help

EXAMPLES:
  waypoint route graphs/app.graph.ts --to Settings
  waypoint route graphs/app.graph.ts --from About --to Home
`.trim();

const WALK_HELP = `
waypoint walk - Visit every scene in a browser and screenshot it

USAGE:
  waypoint walk <graph-file> [options]

ARGUMENTS:
  <graph-file>          Path to graph definition file

OPTIONS:
  -u, --base-url <url>  Base URL of the app (required)
  -d, --device <name>   Device preset (default: desktop)
  -o, --output <dir>    Screenshot directory (default: from config)
  -f, --format <fmt>    Output format: json, markdown (default: json)
  -h, --help            Show this help

EXAMPLES:
  waypoint walk graphs/app.graph.ts --base-url http://localhost:3000
  waypoint walk graphs/app.graph.ts -u http://localhost:3000 -d mobile -f markdown
`.trim();

const LIST_HELP = `
waypoint list - List graph files

USAGE:
  waypoint list [dir]

ARGUMENTS:
  [dir]                 Directory to search (default: graphs.dir from config)
`.trim();

export const getHelp = (subcommand: string | null): string => {
  switch (subcommand) {
    case 'validate':
      return VALIDATE_HELP;
    case 'route':
      return ROUTE_HELP;
    case 'walk':
      return WALK_HELP;
    case 'list':
      return LIST_HELP;
    default:
      return MAIN_HELP;
  }
};

export const getVersion = (): string => VERSION;
