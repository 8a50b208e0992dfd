import { mkdtemp, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { fileURLToPath } from 'node:url'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { run } from './cli'
import { usage } from './config'
import { column } from './test-helpers'

const SAMPLE_TRACE = fileURLToPath(new URL('../fixtures/sample-trace.xml', import.meta.url))

const pad = (count: number): string => ' '.repeat(count)

const createIo = () => {
  const stdout: string[] = []
  const stderr: string[] = []
  return {
    stdout,
    stderr,
    io: {
      stdout: (line: string) => {
        stdout.push(line)
      },
      stderr: (line: string) => {
        stderr.push(line)
      },
      env: {},
    },
  }
}

describe('run', () => {
  let tempDir: string

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'trace-stats-cli-'))
  })

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true })
  })

  it('prints the nine summary lines and exits 0', async () => {
    const { stdout, stderr, io } = createIo()

    const code = await run([SAMPLE_TRACE], io)

    expect(code).toBe(0)
    expect(stderr).toEqual([])
    expect(stdout).toEqual([
      `${pad(9)}Sample Size:${pad(19)}2`,
      `${pad(13)}Min CPU:${pad(18)}10`,
      `${pad(13)}Max CPU:${pad(18)}20`,
      `${pad(9)}Average CPU:${pad(18)}15`,
      `${pad(8)}Min Duration:${pad(17)}100`,
      `${pad(8)}Max Duration:${pad(17)}300`,
      `${pad(4)}Average Duration:${pad(17)}200`,
      `${pad(7)}Average Reads:${pad(18)}10`,
      `${pad(6)}Average Writes:${pad(19)}5`,
    ])
  })

  it('prints usage for --help', async () => {
    const { stdout, io } = createIo()

    expect(await run(['--help'], io)).toBe(0)
    expect(stdout).toEqual([usage])
  })

  it('exits 2 without writing stdout when the input path is missing', async () => {
    const { stdout, stderr, io } = createIo()

    const code = await run([], io)

    expect(code).toBe(2)
    expect(stdout).toEqual([])
    expect(stderr).toEqual(['[trace-stats] error (argument): Missing input file argument'])
  })

  it('exits 1 without writing stdout when the file does not exist', async () => {
    const { stdout, stderr, io } = createIo()
    const missing = join(tempDir, 'missing.xml')

    const code = await run([missing], io)

    expect(code).toBe(1)
    expect(stdout).toEqual([])
    expect(stderr).toHaveLength(1)
    expect(stderr[0]).toMatch(/^\[trace-stats\] error \(io\): Cannot read trace file /)
  })

  it('exits 1 without writing stdout when no event matches', async () => {
    const filePath = join(tempDir, 'trace.xml')
    await writeFile(
      filePath,
      `<TraceData><Events><Event>${column('ApplicationName', 'Other Driver')}${column('TextData', 'declare x')}${column('CPU', '4')}</Event></Events></TraceData>`,
      'utf8'
    )
    const { stdout, stderr, io } = createIo()

    const code = await run([filePath], io)

    expect(code).toBe(1)
    expect(stdout).toEqual([])
    expect(stderr).toEqual([
      '[trace-stats] error (empty-result): No events matched the filters; min, max and average are undefined for an empty set',
    ])
  })

  it('exits 1 without writing stdout on a schema error', async () => {
    const filePath = join(tempDir, 'trace.xml')
    await writeFile(
      filePath,
      `<TraceData><Events><Event>${column('ApplicationName', 'Microsoft JDBC Driver for SQL Server')}${column('Duration', 'slow')}</Event></Events></TraceData>`,
      'utf8'
    )
    const { stdout, stderr, io } = createIo()

    const code = await run([filePath], io)

    expect(code).toBe(1)
    expect(stdout).toEqual([])
    expect(stderr).toEqual(['[trace-stats] error (schema): Column "Duration" is not an integer: "slow"'])
  })
})
