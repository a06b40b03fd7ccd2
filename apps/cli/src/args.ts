/**
 * Command-line parsing
 *
 * Flags may appear before or after the subcommand, as `--flag value` or
 * `--flag=value`. The raw flag map is validated with zod per subcommand.
 */

import { z } from 'zod';

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

// flag spelling -> option property
const FLAGS: Record<string, string> = {
  url: 'url',
  u: 'url',
  project: 'project',
  p: 'project',
  org: 'org',
  o: 'org',
  region: 'region',
  'api-key': 'apiKey',
  'access-key': 'accessKey',
  'secret-key': 'secretKey',
  s: 'secretKey',
  name: 'name',
  bucket: 'bucket',
  key: 'key',
  'file-path': 'filePath',
  'content-type': 'contentType',
  metadata: 'metadata',
  output: 'output',
  'source-bucket': 'sourceBucket',
  'source-key': 'sourceKey',
  'continuation-token': 'continuationToken',
};

const BOOLEAN_FLAGS = new Set(['help', 'h']);

const COMMAND_ALIASES: Record<string, string> = {
  'get-head-object': 'head-object',
};

const optionalText = z.string().trim().min(1).optional();

function required(flag: string) {
  return z
    .string({ required_error: `--${flag} is required` })
    .trim()
    .min(1, `--${flag} must not be empty`);
}

const optionalId = (flag: string, min: number) =>
  z.coerce
    .number({ invalid_type_error: `--${flag} must be a number` })
    .int(`--${flag} must be an integer`)
    .min(min, `--${flag} must be >= ${min}`)
    .optional();

/** `k=v,k=v` -> record; values may contain '=' */
const MetadataSchema = z.string().transform((value, ctx) => {
  const metadata: Record<string, string> = {};
  for (const pair of value.split(',')) {
    const separator = pair.indexOf('=');
    const name = separator === -1 ? '' : pair.slice(0, separator).trim();
    if (!name) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `--metadata entry must be key=value. Got: ${pair}` });
      return z.NEVER;
    }
    metadata[name] = pair.slice(separator + 1).trim();
  }
  return metadata;
});

const GlobalOptionsSchema = z.object({
  url: optionalText,
  project: optionalId('project', 1),
  org: optionalId('org', 0),
  region: optionalText,
  apiKey: optionalText,
  accessKey: optionalText,
  secretKey: optionalText,
});

export type GlobalOptions = z.infer<typeof GlobalOptionsSchema>;

const CommandSchema = z.discriminatedUnion('command', [
  z.object({ command: z.literal('create-bucket'), name: required('name') }),
  z.object({ command: z.literal('delete-bucket'), name: required('name') }),
  z.object({ command: z.literal('list-buckets') }),
  z.object({
    command: z.literal('put-object'),
    bucket: required('bucket'),
    key: required('key'),
    filePath: required('file-path'),
    contentType: optionalText,
    metadata: MetadataSchema.optional(),
  }),
  z.object({
    command: z.literal('get-object'),
    bucket: required('bucket'),
    key: required('key'),
    output: required('output'),
  }),
  z.object({
    command: z.literal('copy-object'),
    bucket: required('bucket'),
    key: required('key'),
    sourceBucket: required('source-bucket'),
    sourceKey: required('source-key'),
  }),
  z.object({ command: z.literal('delete-object'), bucket: required('bucket'), key: required('key') }),
  z.object({ command: z.literal('list-objects'), bucket: required('bucket'), continuationToken: optionalText }),
  z.object({ command: z.literal('head-object'), bucket: required('bucket'), key: required('key') }),
  z.object({ command: z.literal('env') }),
  z.object({ command: z.literal('help') }),
]);

export type Command = z.infer<typeof CommandSchema>;
export type CommandName = Command['command'];

export interface ParsedArgs {
  globals: GlobalOptions;
  command: Command;
}

/**
 * Split argv into the subcommand and a flag map
 */
export function tokenize(argv: readonly string[]): { positionals: string[]; flags: Record<string, string>; help: boolean } {
  const positionals: string[] = [];
  const flags: Record<string, string> = {};
  let help = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === undefined) continue;

    if (!arg.startsWith('-') || arg === '-') {
      positionals.push(arg);
      continue;
    }

    const body = arg.replace(/^--?/, '');
    const equals = body.indexOf('=');
    const flag = equals === -1 ? body : body.slice(0, equals);

    if (BOOLEAN_FLAGS.has(flag)) {
      help = true;
      continue;
    }

    const property = FLAGS[flag];
    if (!property) {
      throw new UsageError(`Unknown option: ${arg}`);
    }

    let value: string | undefined;
    if (equals !== -1) {
      value = body.slice(equals + 1);
    } else {
      value = argv[i + 1];
      i++;
    }
    if (value === undefined || (equals === -1 && value.startsWith('--'))) {
      throw new UsageError(`Option ${arg} requires a value`);
    }
    flags[property] = value;
  }

  return { positionals, flags, help };
}

function formatIssues(error: z.ZodError): string {
  return error.issues.map((issue) => issue.message).join('; ');
}

export function parseArgs(argv: readonly string[]): ParsedArgs {
  const { positionals, flags, help } = tokenize(argv);

  const globals = GlobalOptionsSchema.safeParse(flags);
  if (!globals.success) {
    throw new UsageError(formatIssues(globals.error));
  }

  const [name, ...extra] = positionals;
  if (help || name === undefined) {
    return { globals: globals.data, command: { command: 'help' } };
  }
  if (extra.length > 0) {
    throw new UsageError(`Unexpected argument: ${extra[0]}`);
  }

  const commandName = COMMAND_ALIASES[name] ?? name;
  const command = CommandSchema.safeParse({ ...flags, command: commandName });
  if (!command.success) {
    const unknown = command.error.issues.some((issue) => issue.code === z.ZodIssueCode.invalid_union_discriminator);
    throw new UsageError(unknown ? `Unknown command: ${name}` : formatIssues(command.error));
  }

  return { globals: globals.data, command: command.data };
}

export const USAGE = `Usage: scoped-s3 [options] <command> [command options]

Options:
  -u, --url <url>            Storage endpoint (default http://localhost:9000, env SCOPED_S3_URL)
  -p, --project <id>         Project id (env SCOPED_S3_PROJECT_ID)
  -o, --org <id>             Organisation id (default 0, env SCOPED_S3_ORG_ID)
      --region <region>      Signing region (default us-east-1, env SCOPED_S3_REGION)
      --api-key <key>        Project API key (env SCOPED_S3_API_KEY)
      --access-key <id>      Native S3 access key id, instead of an API key
  -s, --secret-key <secret>  Native S3 secret access key
  -h, --help                 Show this help

Commands:
  create-bucket --name <bucket>
  delete-bucket --name <bucket>
  list-buckets
  put-object    --bucket <bucket> --key <key> --file-path <path> [--content-type <type>] [--metadata k=v,k=v]
  get-object    --bucket <bucket> --key <key> --output <path>
  copy-object   --bucket <bucket> --key <key> --source-bucket <bucket> --source-key <key>
  delete-object --bucket <bucket> --key <key>
  list-objects  --bucket <bucket> [--continuation-token <token>]
  head-object   --bucket <bucket> --key <key>
  env           Show environment diagnostics
`;
