export interface IngestCliOptions {
    filePath?: string;
    configPath?: string;
    questions: string[];
    help: boolean;
}

export const INGEST_USAGE = [
    "Usage: doc-assistant-ingest <file> [--question <text>]... [--config <path-to-env>]",
    "",
    "Ingests a .pdf or .txt file, prints its summary and answers each question.",
    "",
    "Options:",
    "  -q, --question Question to answer from the document. May be repeated.",
    "  -c, --config   Path to the .env configuration file (defaults to .env in the working directory).",
    "  -h, --help     Show this help message.",
].join("\n");

function requireValue(argv: readonly string[], index: number, flag: string): string {
    const value = argv[index + 1];
    if (value === undefined || value.startsWith("-")) {
        throw new Error(`The ${flag} option requires a value.`);
    }
    return value;
}

export function parseIngestArgs(argv: readonly string[]): IngestCliOptions {
    const options: IngestCliOptions = { questions: [], help: false };

    for (let i = 0; i < argv.length; i += 1) {
        const arg = argv[i];

        switch (arg) {
            case "-h":
            case "--help":
                options.help = true;
                break;
            case "-c":
            case "--config":
                options.configPath = requireValue(argv, i, arg);
                i += 1;
                break;
            case "-q":
            case "--question":
                options.questions.push(requireValue(argv, i, arg));
                i += 1;
                break;
            default:
                if (arg.startsWith("-")) {
                    throw new Error(`Unknown option: ${arg}`);
                }
                if (options.filePath) {
                    throw new Error(`Unexpected argument: ${arg}`);
                }
                options.filePath = arg;
                break;
        }
    }

    return options;
}
