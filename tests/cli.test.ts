import { resolve } from 'node:path'
import { describe, expect, it } from 'vitest'
import { HelpRequested, parseBaitoutArgs, parseCreateUserArgs, parseOutingArgs } from '../src/cli/transectAdmin'

describe('transect-admin argument parsing', () => {
  it('defaults import-outings to tab separated with four header lines', () => {
    expect(parseOutingArgs(['field.tsv'])).toEqual({
      filePath: resolve(process.cwd(), 'field.tsv'),
      delimiter: '\t',
      headerLines: 4,
    })
  })

  it('reads import-outings options', () => {
    expect(parseOutingArgs(['--delimiter', 'pipe', '--skip', '0', '/data/field.txt'])).toEqual({
      filePath: '/data/field.txt',
      delimiter: '|',
      headerLines: 0,
    })
    expect(() => parseOutingArgs(['--delimiter', 'semicolon', 'x'])).toThrow('Unknown delimiter: semicolon')
    expect(() => parseOutingArgs(['--skip', '-1', 'x'])).toThrow('--skip expects a non-negative integer, got: -1')
    expect(() => parseOutingArgs([])).toThrow('Missing file to import.')
  })

  it('reads import-baitout arguments', () => {
    expect(parseBaitoutArgs(['spring24', '/data/baitout.txt', '--commit', '--limit', '5'])).toEqual({
      tag: 'spring24',
      filePath: '/data/baitout.txt',
      commit: true,
      limit: 5,
    })
    expect(parseBaitoutArgs(['spring24', '/data/baitout.txt'])).toMatchObject({ commit: false, limit: null })
    expect(() => parseBaitoutArgs(['spring24'])).toThrow('Usage: import-baitout <tag> <file> [--commit] [--limit <n>]')
  })

  it('reads create-user arguments', () => {
    expect(parseCreateUserArgs(['ranger', '--password', 'test-password', '--role', 'editor', '--role', 'VIEWER'])).toEqual({
      username: 'ranger',
      password: 'test-password',
      roles: ['EDITOR', 'VIEWER'],
    })
    expect(() => parseCreateUserArgs(['ranger', '--role', 'owner'])).toThrow('Unknown role: owner')
  })

  it('signals a help request', () => {
    expect(() => parseBaitoutArgs(['--help'])).toThrow(HelpRequested)
  })
})
