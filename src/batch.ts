import { mkdir, readFile, writeFile } from 'node:fs/promises'
import { basename, join } from 'node:path'
import { type DecodeOptions, type DecodeReport, describeStep, decodeAsset } from './chain'
import { ConsoleLogger } from './logger'
import { ObjWriter } from './obj-writer'
import { FormatSniffer } from './sniffer'
import { ZipUtils } from './utils/zipUtils'

export type BatchStatus = 'converted' | 'failed'

/**
 * Outcome of one input file
 */
export interface BatchEntry {
  file: string
  modelName: string
  status: BatchStatus

  /**
   * Winning strategy, e.g. "compressed (forced)"
   */
  strategy?: string
  vertexCount: number

  /**
   * Faces written after degenerate ones were dropped
   */
  faceCount: number
  droppedFaces: number
  elapsedMs: number
  error?: string
  outputPath?: string
}

export interface BatchReport {
  entries: BatchEntry[]
  converted: number
  failed: number
  reportPath: string
  archivePath?: string
}

export interface BatchOptions extends DecodeOptions {
  /**
   * Directory receiving the OBJ files and the report, created when missing
   */
  outDir: string

  /**
   * File name of a zip archive of every output, written to outDir
   */
  archive?: string

  /**
   * Clock for the report file name
   */
  now?: () => Date
}

/**
 * Summary rendering for a batch run
 */
export class BatchReportUtils {

  /**
   * Local time as YYYYMMDD_HHMMSS
   */
  static timestamp(date: Date): string {
    const pad = (value: number): string => String(value).padStart(2, '0')
    return `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
      `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  }

  static reportName(date: Date): string {
    return `conversion-report-${BatchReportUtils.timestamp(date)}.txt`
  }

  static render(entries: BatchEntry[]): string {
    const converted = entries.filter(entry => entry.status === 'converted').length
    const lines = [
      'Conversion report',
      `Files: ${entries.length}, converted: ${converted}, failed: ${entries.length - converted}`,
      ''
    ]
    for (const entry of entries) {
      if (entry.status === 'converted') {
        const output = entry.outputPath ? basename(entry.outputPath) : `${entry.modelName}.obj`
        lines.push(
          `[OK] ${entry.file} -> ${output} (${entry.strategy ?? 'unknown'}, ` +
          `${entry.vertexCount} vertices, ${entry.faceCount} faces, ${entry.droppedFaces} dropped, ${entry.elapsedMs} ms)`
        )
      } else {
        lines.push(`[FAILED] ${entry.file}: ${entry.error ?? 'unknown error'}`)
      }
    }
    return lines.map(line => `${line}\n`).join('')
  }

  /**
   * `model.obj`, or `model_2.obj` and up when an earlier input of the
   * batch already took that name
   */
  static outputName(modelName: string, taken: Record<string, string>): string {
    let name = `${modelName}.obj`
    for (let n = 2; Object.hasOwn(taken, name); n++) {
      name = `${modelName}_${n}.obj`
    }
    return name
  }

  /**
   * One-line reason for a failed decode, listing each attempt
   */
  static describeFailure(report: Extract<DecodeReport, { ok: false }>): string {
    if (report.attempts.length === 0) return report.message
    const attempts = report.attempts.map(attempt =>
      `${describeStep(attempt)}: ${attempt.reason.kind} (${attempt.reason.message})`
    )
    return `${report.message}; ${attempts.join('; ')}`
  }
}

/**
 * Convert files one after another. A failure is recorded and the batch
 * moves on to the next file.
 */
export async function convertFiles(paths: string[], options: BatchOptions): Promise<BatchReport> {
  const logger = options.logger ?? new ConsoleLogger('info')
  const decodeOptions: DecodeOptions = { ...options, logger }
  await mkdir(options.outDir, { recursive: true })

  const entries: BatchEntry[] = []
  const outputs: Record<string, string> = {}

  for (const file of paths) {
    const name = basename(file)
    const modelName = FormatSniffer.modelName(name)
    const started = performance.now()
    const entry: BatchEntry = {
      file: name,
      modelName,
      status: 'failed',
      vertexCount: 0,
      faceCount: 0,
      droppedFaces: 0,
      elapsedMs: 0
    }

    try {
      const bytes = await readFile(file)
      const report = decodeAsset({ bytes, filename: name }, decodeOptions)
      if (report.ok) {
        const strategy = describeStep(report)
        const text = ObjWriter.serialize(report.mesh, `${name}: ${strategy} via ${report.source}`)
        const outputName = BatchReportUtils.outputName(modelName, outputs)
        if (outputName !== `${modelName}.obj`) {
          logger.warn(`${file}: ${modelName}.obj is taken by an earlier input, writing ${outputName}`)
        }
        const outputPath = join(options.outDir, outputName)
        await writeFile(outputPath, text, 'utf8')
        outputs[outputName] = text
        entry.status = 'converted'
        entry.strategy = strategy
        entry.vertexCount = report.stats.vertexCount
        entry.faceCount = report.stats.validTriangles
        entry.droppedFaces = report.stats.droppedTriangles
        entry.outputPath = outputPath
      } else {
        entry.error = BatchReportUtils.describeFailure(report)
      }
    } catch (error) {
      entry.error = error instanceof Error ? error.message : String(error)
      logger.error(`${name}: ${entry.error}`)
    }

    entry.elapsedMs = Math.round(performance.now() - started)
    entries.push(entry)
  }

  const reportName = BatchReportUtils.reportName(options.now?.() ?? new Date())
  const reportText = BatchReportUtils.render(entries)
  const reportPath = join(options.outDir, reportName)
  await writeFile(reportPath, reportText, 'utf8')

  let archivePath: string | undefined
  if (options.archive) {
    archivePath = join(options.outDir, options.archive)
    await writeFile(archivePath, await ZipUtils.bundle({ ...outputs, [reportName]: reportText }))
  }

  const converted = entries.filter(entry => entry.status === 'converted').length
  logger.info(`Converted ${converted} of ${entries.length} files, report at ${reportPath}`)

  return { entries, converted, failed: entries.length - converted, reportPath, archivePath }
}
