#!/usr/bin/env node

import { isAbsolute, resolve } from 'node:path'
import eventPublisher from '../events/eventPublisher'
import { importBaitout } from '../importers/baitoutImporter'
import type { BaitoutImportOptions } from '../importers/baitoutImporter'
import { DEFAULT_HEADER_LINES, importOutings } from '../importers/outingImporter'
import type { OutingImportOptions } from '../importers/outingImporter'
import { DELIMITERS } from '../lib/tabular'
import type { DelimiterName } from '../lib/tabular'
import { UserService } from '../services/userService'
import { USER_ROLES } from '../types/user'
import type { UserRole } from '../types/user'
import { getErrorMessage } from '../utils/errors'

export class HelpRequested extends Error {
  constructor() {
    super('help')
  }
}

export type OutingCommand = OutingImportOptions & { filePath: string }

export type BaitoutCommand = BaitoutImportOptions & { filePath: string }

export type CreateUserCommand = {
  username: string
  password: string
  roles: UserRole[]
}

const isDelimiterName = (value: string): value is DelimiterName => Object.hasOwn(DELIMITERS, value)

const isUserRole = (value: string): value is UserRole => USER_ROLES.some((role) => role === value)

const absolutizePath = (rawPath: string): string => (isAbsolute(rawPath) ? rawPath : resolve(process.cwd(), rawPath))

const nonNegativeInteger = (flag: string, raw: string | undefined): number => {
  const parsed = Number(raw)
  if (raw === undefined || !Number.isInteger(parsed) || parsed < 0) {
    throw new Error(`${flag} expects a non-negative integer, got: ${raw ?? '(nothing)'}`)
  }
  return parsed
}

export function printHelp(): void {
  const lines = [
    'transect-admin - maintenance tracking utilities',
    '',
    'Usage:',
    '  transect-admin import-outings <file> [--delimiter tab|pipe|comma] [--skip <n>]',
    '  transect-admin import-baitout <tag> <file> [--commit] [--limit <n>]',
    '  transect-admin create-user <username> --password <password> --role <role> [--role <role>]',
    '',
    'import-outings reads a field spreadsheet export (tab separated by default) and skips',
    `the first ${DEFAULT_HEADER_LINES} lines unless --skip says otherwise.`,
    '',
    'import-baitout reads a pipe separated baitout export. Nothing is written without --commit.',
    '',
    `Roles: ${USER_ROLES.join(', ')}`,
  ]

  process.stdout.write(`${lines.join('\n')}\n`)
}

export function parseOutingArgs(argv: string[]): OutingCommand {
  let filePath: string | undefined
  const options: OutingImportOptions = { delimiter: DELIMITERS.tab, headerLines: DEFAULT_HEADER_LINES }

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i]

    if (arg === '--help') {
      throw new HelpRequested()
    }

    if (arg === '--delimiter') {
      const name = argv[i + 1] ?? ''
      if (!isDelimiterName(name)) {
        throw new Error(`Unknown delimiter: ${name || '(nothing)'}`)
      }
      options.delimiter = DELIMITERS[name]
      i += 1
      continue
    }

    if (arg === '--skip') {
      options.headerLines = nonNegativeInteger('--skip', argv[i + 1])
      i += 1
      continue
    }

    if (arg.startsWith('--') || filePath !== undefined) {
      throw new Error(`Unknown arg: ${arg}`)
    }

    filePath = arg
  }

  if (filePath === undefined) {
    throw new Error('Missing file to import.')
  }

  return { ...options, filePath: absolutizePath(filePath) }
}

export function parseBaitoutArgs(argv: string[]): BaitoutCommand {
  const positional: string[] = []
  let commit = false
  let limit: number | null = null

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i]

    if (arg === '--help') {
      throw new HelpRequested()
    }

    if (arg === '--commit') {
      commit = true
      continue
    }

    if (arg === '--limit') {
      limit = nonNegativeInteger('--limit', argv[i + 1])
      i += 1
      continue
    }

    if (arg.startsWith('--') || positional.length === 2) {
      throw new Error(`Unknown arg: ${arg}`)
    }

    positional.push(arg)
  }

  const [tag, filePath] = positional
  if (!tag || !filePath) {
    throw new Error('Usage: import-baitout <tag> <file> [--commit] [--limit <n>]')
  }

  return { tag, filePath: absolutizePath(filePath), commit, limit }
}

export function parseCreateUserArgs(argv: string[]): CreateUserCommand {
  let username: string | undefined
  let password = ''
  const roles: UserRole[] = []

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i]

    if (arg === '--help') {
      throw new HelpRequested()
    }

    if (arg === '--password') {
      password = argv[i + 1] ?? ''
      i += 1
      continue
    }

    if (arg === '--role') {
      const role = (argv[i + 1] ?? '').toUpperCase()
      if (!isUserRole(role)) {
        throw new Error(`Unknown role: ${argv[i + 1] ?? '(nothing)'}`)
      }
      roles.push(role)
      i += 1
      continue
    }

    if (arg.startsWith('--') || username !== undefined) {
      throw new Error(`Unknown arg: ${arg}`)
    }

    username = arg
  }

  if (username === undefined) {
    throw new Error('Missing username.')
  }

  return { username, password, roles }
}

export async function run(args: string[]): Promise<void> {
  if (args.length === 0 || args[0] === '--help' || args[0] === '-h') {
    printHelp()
    return
  }

  const [command, ...rest] = args

  if (command === 'import-outings') {
    const { filePath, ...options } = parseOutingArgs(rest)
    const summary = await importOutings(filePath, options)
    console.log(JSON.stringify(summary, null, 2))
    if (summary.rowsFailed > 0) {
      process.exitCode = 2
    }
    return
  }

  if (command === 'import-baitout') {
    const { filePath, ...options } = parseBaitoutArgs(rest)
    const summary = await importBaitout(filePath, options)
    console.log(JSON.stringify(summary, null, 2))
    console.log(`Successfully imported baitout data, created ${summary.issuesCreated} issues (commit=${summary.committed}).`)
    return
  }

  if (command === 'create-user') {
    const user = await UserService.create(parseCreateUserArgs(rest))
    console.log(`Created user ${user.username} with roles ${user.roles.join(', ')}`)
    return
  }

  printHelp()
  process.exitCode = 2
}

if (require.main === module) {
  run(process.argv.slice(2))
    .catch((error: unknown) => {
      if (error instanceof HelpRequested) {
        printHelp()
        return
      }

      process.stderr.write(`${getErrorMessage(error)}\n`)
      process.exitCode = 2
    })
    .finally(() => eventPublisher.close())
}
