export type CliAction =
  | { kind: "check-now" }
  | { kind: "send-report" }
  | { kind: "simulate-down"; host: string };

export interface CliOptions {
  help: boolean;
  configPath?: string;
  actions: CliAction[];
  /** Problems worth a warning; none of them are fatal. */
  warnings: string[];
}

export const USAGE = [
  "Host Monitor - probes hosts over TCP and emails alerts and a daily report",
  "",
  "Usage: host-monitor [options]",
  "",
  "Options:",
  "  --config <path>          Read configuration from <path> (default: monitor.yaml)",
  "  --check-now              Check all hosts immediately",
  "  --send-report            Send the status report immediately",
  "  --simulate-down <host>   Mark <host> as DOWN and send a critical alert",
  "  --help                   Show this help message",
].join("\n");

/** Parses argv (without node and script). Unknown arguments are ignored with a warning. */
export function parseArgs(argv: string[]): CliOptions {
  const opts: CliOptions = { help: false, actions: [], warnings: [] };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case "--check-now":
        opts.actions.push({ kind: "check-now" });
        break;
      case "--send-report":
        opts.actions.push({ kind: "send-report" });
        break;
      case "--simulate-down": {
        const host = argv[i + 1];
        if (host === undefined || host.startsWith("--")) {
          opts.warnings.push("--simulate-down requires a hostname parameter");
        } else {
          opts.actions.push({ kind: "simulate-down", host });
          i++;
        }
        break;
      }
      case "--config": {
        const path = argv[i + 1];
        if (path === undefined || path.startsWith("--")) {
          opts.warnings.push("--config requires a path parameter");
        } else {
          opts.configPath = path;
          i++;
        }
        break;
      }
      case "--help":
      case "-h":
        opts.help = true;
        break;
      default:
        opts.warnings.push(`unknown argument: ${arg}`);
    }
  }

  return opts;
}
