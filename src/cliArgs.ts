import { normalizeExportFormat } from "./utils/rdfSerialization";

export const VERSION = "0.4.0";
export const HELP = `
vocab-compiler v${VERSION}

Usage:
  vocab-compiler -i <input.csv> -o <output.ttl> [options]

Options:
  -i, --input <file>          Vocabulary table (CSV, header row)
  -o, --output <file>         Turtle output
  --ntriples <file>           Also write N-Triples
  --format <turtle|ntriples>  Format of --output (default turtle)
  -c, --config <file>         JSON configuration merged over the defaults
  -m, --metadata <file>       Ontology metadata merged before the rows (Turtle, RDF/XML, JSON-LD)
  -p, --prefixes <file>       Turtle file whose @prefix lines extend the namespace table
  -r, --releases <file>       Releases list (CSV)
  -n, --notes <file>          Change notes list (CSV)
  -ns, --namespace <iri>      Managed namespace
  -url, --publishing-url <u>  Base URL of published versions
  -v, --version <x.y.z>       Version being built
  -pv, --prior-version <x.y.z>
  --log-level <level>         debug | info | warn | error | silent
  -h, --help                  Show this help
  --about                     Show the compiler version
`;

export interface CliOptions {
  input?: string;
  output?: string;
  outputFormat: "turtle" | "ntriples";
  ntriples?: string;
  config?: string;
  metadata?: string;
  prefixes?: string;
  releases?: string;
  notes?: string;
  namespace?: string;
  publishingUrl?: string;
  version?: string;
  priorVersion?: string;
  logLevel?: string;
  help: boolean;
  about: boolean;
}

type ValueKey = Exclude<keyof CliOptions, "help" | "about" | "outputFormat">;

const VALUE_FLAGS: Partial<Record<string, ValueKey>> = {
  "-i": "input",
  "--input": "input",
  "-o": "output",
  "--output": "output",
  "--ntriples": "ntriples",
  "-c": "config",
  "--config": "config",
  "-m": "metadata",
  "--metadata": "metadata",
  "-p": "prefixes",
  "--prefixes": "prefixes",
  "-r": "releases",
  "--releases": "releases",
  "-n": "notes",
  "--notes": "notes",
  "-ns": "namespace",
  "--namespace": "namespace",
  "-url": "publishingUrl",
  "--publishing-url": "publishingUrl",
  "-v": "version",
  "--version": "version",
  "-pv": "priorVersion",
  "--prior-version": "priorVersion",
  "--log-level": "logLevel",
};

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
  }
}

/** Parse argv (without the node and script entries). Accepts `--flag value` and `--flag=value`. */
export function parseCliArgs(args: string[]): CliOptions {
  const options: CliOptions = { outputFormat: "turtle", help: false, about: false };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === "-h" || arg === "--help") {
      options.help = true;
      continue;
    }
    if (arg === "--about") {
      options.about = true;
      continue;
    }

    const eq = arg.indexOf("=");
    const flag = eq > 0 ? arg.substring(0, eq) : arg;
    let value = eq > 0 ? arg.substring(eq + 1) : undefined;
    if (value === undefined && (flag === "--format" || VALUE_FLAGS[flag])) {
      if (i + 1 >= args.length) throw new CliUsageError(`Missing value for ${flag}`);
      value = args[i + 1];
      i++;
    }

    if (flag === "--format") {
      const format = normalizeExportFormat(value ?? "");
      if (!format) throw new CliUsageError(`Unknown output format '${value ?? ""}'`);
      options.outputFormat = format;
      continue;
    }
    const key = VALUE_FLAGS[flag];
    if (!key) throw new CliUsageError(`Unknown option '${arg}'`);
    options[key] = value;
  }
  return options;
}
