import { env } from '../config/env'
import { normalizeError } from '../errors/metadata-error'
import { MetadataService } from '../modules/metadata/metadata.service'
import { encodeForLiteralChannel } from '../modules/value-codec/value-codec'

export const HELP_TEXT = `
pdf-info - Read and edit the document information dictionary of a PDF

Usage: pdf-info <command> <file> [args] [options]

Commands:
  list <file>                    Print every metadata entry
  set <file> <key> <value>       Set one entry (replaces the file atomically)
  remove <file> <key>            Delete one entry
  rename <file> <from> <to>      Move an entry to a new key

Options:
  -o, --output <path>   set: write to <path> instead of replacing <file>
      --plain           set: store non-ASCII values as raw UTF-8
  -h, --help            Show this help message

Environment:
  PDF_INFO_ENCODE_NON_ASCII   write non-ASCII values as UTF16BE:<base64> (default: true)
  LOG_LEVEL                   pino log level (logs go to stderr)

Examples:
  pdf-info list report.pdf
  pdf-info set report.pdf Author "Jane Doe"
  pdf-info set report.pdf Title "Relatório" --output copy.pdf
  pdf-info rename report.pdf Keywords Tags
`

export type CliCommand =
  | { command: 'help' }
  | { command: 'list'; file: string }
  | { command: 'set'; file: string; key: string; value: string; output?: string; plain: boolean }
  | { command: 'remove'; file: string; key: string }
  | { command: 'rename'; file: string; fromKey: string; toKey: string }

export type ParseResult = { ok: true; value: CliCommand } | { ok: false; error: string }

const ARITY: Record<Exclude<CliCommand['command'], 'help'>, number> = {
  list: 1,
  set: 3,
  remove: 2,
  rename: 3
}

const isCommandName = (name: string): name is keyof typeof ARITY => name in ARITY

/**
 * Parse command line arguments. Everything after `--` is positional.
 */
export function parseArgs(args: string[]): ParseResult {
  const positional: string[] = []
  let output: string | undefined
  let plain = false
  let help = false

  let i = 0
  while (i < args.length) {
    const arg = args[i]

    switch (arg) {
      case '-h':
      case '--help':
        help = true
        break

      case '-o':
      case '--output':
        output = args[++i]
        if (output === undefined) {
          return { ok: false, error: `Option ${arg} needs a path` }
        }
        break

      case '--plain':
        plain = true
        break

      case '--':
        positional.push(...args.slice(i + 1))
        i = args.length
        break

      default:
        if (arg.startsWith('-') && arg.length > 1) {
          return { ok: false, error: `Unknown option '${arg}'` }
        }
        positional.push(arg)
        break
    }

    i++
  }

  if (help || positional.length === 0) {
    return { ok: true, value: { command: 'help' } }
  }

  const [name, ...rest] = positional
  if (!isCommandName(name)) {
    return { ok: false, error: `Unknown command '${name}'` }
  }
  if (rest.length !== ARITY[name]) {
    return { ok: false, error: `'${name}' takes ${ARITY[name]} argument(s), got ${rest.length}` }
  }
  if (name !== 'set' && (output !== undefined || plain)) {
    return { ok: false, error: `--output and --plain only apply to 'set'` }
  }

  const [file, first, second] = rest
  switch (name) {
    case 'list':
      return { ok: true, value: { command: 'list', file } }
    case 'set':
      return { ok: true, value: { command: 'set', file, key: first, value: second, output, plain } }
    case 'remove':
      return { ok: true, value: { command: 'remove', file, key: first } }
    case 'rename':
      return { ok: true, value: { command: 'rename', file, fromKey: first, toKey: second } }
  }
}

export interface CliDeps {
  service: Pick<
    MetadataService,
    'getMetadata' | 'setMetadata' | 'updateMetadataInPlace' | 'removeMetadata' | 'renameMetadataKey'
  >
  encodeNonAscii: boolean
  out: (line: string) => void
  err: (line: string) => void
}

const defaultDeps = (): CliDeps => ({
  service: new MetadataService(),
  encodeNonAscii: env.PDF_INFO_ENCODE_NON_ASCII,
  out: (line) => console.log(line),
  err: (line) => console.error(line)
})

async function execute(command: Exclude<CliCommand, { command: 'help' }>, deps: CliDeps): Promise<void> {
  const { service, out } = deps

  switch (command.command) {
    case 'list': {
      const entries = await service.getMetadata(command.file)
      if (!entries.length) {
        out('No metadata found.')
        return
      }
      for (const { key, value } of entries) {
        out(`${key}: ${value}`)
      }
      return
    }

    case 'set': {
      const value = command.plain || !deps.encodeNonAscii ? command.value : encodeForLiteralChannel(command.value)
      if (command.output !== undefined) {
        await service.setMetadata(command.file, command.output, command.key, value)
        out(`Wrote '${command.key}' to ${command.output}`)
      } else {
        await service.updateMetadataInPlace(command.file, command.key, value)
        out(`Updated '${command.key}' in ${command.file}`)
      }
      return
    }

    case 'remove':
      await service.removeMetadata(command.file, command.key)
      out(`Removed '${command.key}' from ${command.file}`)
      return

    case 'rename':
      await service.renameMetadataKey(command.file, command.fromKey, command.toKey)
      out(`Renamed '${command.fromKey}' to '${command.toKey}' in ${command.file}`)
      return
  }
}

/**
 * Run one command and return the process exit code. Never prompts and never retries.
 */
export async function run(args: string[], deps: CliDeps = defaultDeps()): Promise<number> {
  const parsed = parseArgs(args)
  if (!parsed.ok) {
    deps.err(`Error: ${parsed.error}`)
    deps.err(HELP_TEXT)
    return 64
  }
  if (parsed.value.command === 'help') {
    deps.out(HELP_TEXT)
    return 0
  }

  try {
    await execute(parsed.value, deps)
    return 0
  } catch (err) {
    const normalized = normalizeError(err)
    deps.err(`Error [${normalized.code}]: ${normalized.message}`)
    return normalized.exitCode
  }
}
