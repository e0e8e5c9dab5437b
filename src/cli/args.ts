/**
 * CLI argument parsing.
 *
 * Produces a typed command; flag values are checked later, when the options
 * bundle is built from them.
 */

// Command types
export type Command =
  | { type: "help"; command?: string }
  | { type: "version" }
  | { type: "encode"; options: EncodeOptions }
  | { type: "decode"; options: DecodeOptions }
  | { type: "inspect"; options: InspectOptions }
  | { type: "invalid"; command: string; reason: string }
  | { type: "unknown"; command: string };

/**
 * Serializer policy as given on the command line.
 */
export interface PolicyFlags {
  byteOrder?: string;
  encoding?: string;
  bom: boolean;
  terminator: boolean;
  lengthWidth?: string;
  smallest: boolean;
}

export interface EncodeOptions {
  schema: string;
  /** JSON text, or `@path` to read it from a file. */
  value: string;
  policy: PolicyFlags;
}

export interface DecodeOptions {
  schema: string;
  hex: string;
  policy: PolicyFlags;
}

export interface InspectOptions {
  hex: string;
}

/**
 * Parse command line arguments into a typed Command.
 */
export function parseArgs(argv: string[] = process.argv.slice(2)): Command {
  if (argv.length === 0 || argv[0] === "-h" || argv[0] === "--help") {
    return { type: "help" };
  }

  if (argv[0] === "-v" || argv[0] === "--version") {
    return { type: "version" };
  }

  const command = argv[0];
  const args = argv.slice(1);

  if (hasFlag(args, "help", "h")) {
    return { type: "help", command };
  }

  switch (command) {
    case "encode": {
      const schema = getPositional(args);
      const value = getFlag(args, "value");
      if (schema === undefined) return missing(command, "a schema file");
      if (value === undefined) return missing(command, "--value");
      return { type: "encode", options: { schema, value, policy: parsePolicy(args) } };
    }
    case "decode": {
      const schema = getPositional(args);
      const hex = getFlag(args, "hex");
      if (schema === undefined) return missing(command, "a schema file");
      if (hex === undefined) return missing(command, "--hex");
      return { type: "decode", options: { schema, hex, policy: parsePolicy(args) } };
    }
    case "inspect": {
      const hex = getFlag(args, "hex") ?? getPositional(args);
      if (hex === undefined) return missing(command, "--hex");
      return { type: "inspect", options: { hex } };
    }
    default:
      return { type: "unknown", command };
  }
}

function missing(command: string, what: string): Command {
  return { type: "invalid", command, reason: `${command} needs ${what}` };
}

const VALUE_FLAGS = ["value", "hex", "byte-order", "encoding", "length-width"];

/**
 * Parse a flag value from args, supporting both --flag value and --flag=value.
 */
function getFlag(args: string[], long: string): string | undefined {
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    // --flag=value
    if (arg.startsWith(`--${long}=`)) {
      return arg.slice(`--${long}=`.length);
    }

    // --flag value
    if (arg === `--${long}`) {
      return args[i + 1];
    }
  }
  return undefined;
}

/**
 * Check if a boolean flag is present.
 */
function hasFlag(args: string[], long: string, short?: string): boolean {
  return args.some((arg) => arg === `--${long}` || (short !== undefined && arg === `-${short}`));
}

/**
 * Get positional argument: the first arg that is neither a flag nor a flag's value.
 */
function getPositional(args: string[]): string | undefined {
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg.startsWith("-")) {
      if (VALUE_FLAGS.includes(arg.slice(2))) i++;
      continue;
    }
    return arg;
  }
  return undefined;
}

function parsePolicy(args: string[]): PolicyFlags {
  return {
    byteOrder: getFlag(args, "byte-order"),
    encoding: getFlag(args, "encoding"),
    bom: hasFlag(args, "bom"),
    terminator: hasFlag(args, "terminator"),
    lengthWidth: getFlag(args, "length-width"),
    smallest: hasFlag(args, "smallest"),
  };
}

/**
 * Generate help text for the CLI.
 */
export function getHelpText(): string {
  return `
someip-wire - SOME/IP payload encoder and decoder

Usage:
  someip-wire <command> [options]

Commands:
  encode <schema.json>   Encode a JSON value and print it as hex
  decode <schema.json>   Decode hex bytes and print the value as JSON
  inspect                List the TLV entries of a payload without a schema

Policy Options:
  --byte-order <big|little>             Byte order of values (default: big)
  --encoding <utf-8|utf-16be|utf-16le>  String encoding (default: utf-8)
  --bom                                 Strings start with a byte order mark
  --terminator                          Strings end with a NUL character
  --length-width <0|1|2|4>              Default length field width (default: 4)
  --smallest                            Smallest length fields inside TLV structs

Common Options:
  -h, --help        Show help for command
  -v, --version     Show version

Examples:
  someip-wire encode point.json --value '{"x":1,"y":2}'
  someip-wire encode point.json --value @point-value.json --length-width 2
  someip-wire decode point.json --hex "20 00 00 00 00 01"
  someip-wire inspect --hex 2000000000012001
`;
}

/**
 * Generate help text for a specific command.
 */
export function getCommandHelp(command: string): string {
  switch (command) {
    case "encode":
      return `
someip-wire encode - Encode a JSON value

Usage:
  someip-wire encode <schema.json> --value <json|@file> [policy options]

Arguments:
  schema.json       Schema document describing the root type

Options:
  --value <json>    Value as JSON text, or @path to a JSON file
  -h, --help        Show this help

64-bit integers may be given as decimal strings.
`;

    case "decode":
      return `
someip-wire decode - Decode a payload

Usage:
  someip-wire decode <schema.json> --hex <bytes> [policy options]

Arguments:
  schema.json       Schema document describing the root type

Options:
  --hex <bytes>     Payload as hex; spaces, colons and a 0x prefix are ignored
  -h, --help        Show this help

64-bit integers are printed as decimal strings.
`;

    case "inspect":
      return `
someip-wire inspect - List TLV entries

Usage:
  someip-wire inspect --hex <bytes>

Prints offset, wire type, data id and length of each top-level entry.
Entries of wire type 7 have no length; listing stops there.
`;

    default:
      return getHelpText();
  }
}
