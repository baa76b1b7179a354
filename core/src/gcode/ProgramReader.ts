import {
  AxisPoint,
  BoundingBox,
  ProgramBlock,
  ProgramSummary,
  ReaderOptions,
  ReadIssue,
  ReadWarning
} from './types'

const DEFAULT_OPTIONS: ReaderOptions = {
  rapidRate: 1000
}

// Секунды на разгон и остановку шпинделя, на смену инструмента
const SPINDLE_START_TIME = 2
const SPINDLE_STOP_TIME = 1
const TOOL_CHANGE_TIME = 10

const FULL_TURN = Math.PI * 2
const ARC_RADIUS_TOLERANCE = 0.01

const SUPPORTED_M_CODES = [2, 3, 4, 5, 6, 7, 8, 9, 30, 82, 83]

function normalizeAngle(angle: number): number {
  const turns = angle % FULL_TURN
  return turns < 0 ? turns + FULL_TURN : turns
}

function distance3(from: AxisPoint, to: AxisPoint): number {
  return Math.hypot(to.x - from.x, to.y - from.y, to.z - from.z)
}

/**
 * Reads G-code text back into blocks with absolute positions, and reports
 * counts, path length, bounding box and an estimated run time. Positions
 * assume absolute distance mode (G90).
 */
export class ProgramReader {
  private lineNumber: number = 0
  private errors: ReadIssue[] = []
  private warnings: ReadWarning[] = []
  private readonly options: ReaderOptions

  constructor(options: Partial<ReaderOptions> = {}) {
    this.options = { ...DEFAULT_OPTIONS, ...options }
  }

  // Основной метод разбора
  parse(text: string): ProgramSummary {
    this.lineNumber = 0
    this.errors = []
    this.warnings = []

    const body = text.endsWith('\n') ? text.slice(0, -1) : text
    const lines = body ? body.split('\n') : []
    const blocks: ProgramBlock[] = []
    const motionCounts = { G0: 0, G1: 0, G2: 0, G3: 0 }
    const pathLength = { rapid: 0, feed: 0 }
    const box = new BoxBuilder()

    let commentCount = 0
    let motion: number | undefined
    let feedRate: number | undefined
    let position: AxisPoint = { x: 0, y: 0, z: 0 }
    let estimatedTime = 0

    for (let i = 0; i < lines.length; i++) {
      this.lineNumber = i + 1
      const line = lines[i].trim()
      if (!line) continue

      const code = this.removeComments(line)
      if (!code) {
        commentCount++
        continue
      }

      const block = this.parseLine(line, code, motion, position)
      blocks.push(block)
      motion = block.motion
      if (block.feedRate !== undefined && block.feedRate > 0) {
        feedRate = block.feedRate
      }

      if (block.mCode === 3 || block.mCode === 4) estimatedTime += SPINDLE_START_TIME
      if (block.mCode === 5) estimatedTime += SPINDLE_STOP_TIME
      if (block.mCode === 6) estimatedTime += TOOL_CHANGE_TIME

      if (!this.isMove(block) || block.motion === undefined) continue

      const from = position
      const to = block.position
      const opcode = block.motion === 0 ? 'G0' : block.motion === 1 ? 'G1' : block.motion === 2 ? 'G2' : 'G3'
      motionCounts[opcode]++

      if (block.motion === 0) {
        const length = distance3(from, to)
        pathLength.rapid += length
        estimatedTime += (length / this.options.rapidRate) * 60
      } else {
        if (feedRate === undefined) {
          this.error(block, `${opcode} without an active feed rate`)
        }
        const length = block.motion === 1 ? distance3(from, to) : this.arcLength(block, from, to, box)
        pathLength.feed += length
        if (feedRate !== undefined) {
          estimatedTime += (length / feedRate) * 60
        }
      }

      box.add(to)
      position = to
    }

    this.validateProgram(blocks)

    return {
      success: this.errors.length === 0,
      blocks,
      errors: this.errors,
      warnings: this.warnings,
      lineCount: lines.length,
      blockCount: blocks.length,
      commentCount,
      motionCounts,
      units: this.lastUnits(blocks),
      pathLength,
      estimatedTime,
      boundingBox: box.build()
    }
  }

  private parseLine(line: string, code: string, motion: number | undefined, from: AxisPoint): ProgramBlock {
    const block: ProgramBlock = {
      lineNumber: this.lineNumber,
      original: line,
      code,
      gCodes: [],
      modalGroups: {},
      coordinates: {},
      position: from,
      isValid: true
    }

    // Разбиваем на слова
    for (const word of code.split(/\s+/)) {
      if (!word) continue

      const letter = word[0].toUpperCase()
      const value = Number(word.substring(1))
      if (word.length < 2 || !Number.isFinite(value)) {
        this.error(block, `Malformed word: ${word}`)
        continue
      }

      switch (letter) {
        case 'N':
          break
        case 'G':
          this.parseGCommand(value, block)
          break
        case 'M':
          this.parseMCommand(value, block)
          break
        case 'X':
          block.coordinates.x = value
          break
        case 'Y':
          block.coordinates.y = value
          break
        case 'Z':
          block.coordinates.z = value
          break
        case 'E':
          block.coordinates.e = value
          break
        case 'F':
          block.feedRate = value
          this.validateFeedRate(block, value)
          break
        case 'S':
          block.spindleSpeed = value
          break
        case 'T':
          block.toolNumber = value
          break
        // Параметры дуг и коррекции
        case 'I':
        case 'J':
        case 'K':
        case 'R':
        case 'D':
        case 'P':
          block.parameters = block.parameters || {}
          block.parameters[letter] = value
          break
        default:
          this.warn(block, `Unknown word: ${word}`)
      }
    }

    const explicitMotion = block.motion
    if (block.motion === undefined) {
      block.motion = motion
    }
    if (this.isMove(block)) {
      const { x, y, z } = block.coordinates
      block.position = { x: x ?? from.x, y: y ?? from.y, z: z ?? from.z }
    }

    this.validateBlock(block, explicitMotion)
    return block
  }

  private parseGCommand(gCode: number, block: ProgramBlock): void {
    block.gCodes.push(gCode)

    if ([0, 1, 2, 3].includes(gCode)) {
      block.motion = gCode
      block.modalGroups[1] = `G${gCode}`
    } else if ([17, 18, 19].includes(gCode)) {
      block.modalGroups[2] = `G${gCode}`
    } else if ([90, 91].includes(gCode)) {
      block.modalGroups[3] = `G${gCode}`
    } else if ([20, 21].includes(gCode)) {
      block.modalGroups[6] = `G${gCode}`
    } else if ([40, 41, 42].includes(gCode)) {
      block.modalGroups[7] = `G${gCode}`
    } else if (gCode !== 92) {
      this.warn(block, `G${gCode} is outside the supported subset`)
    }
  }

  private parseMCommand(mCode: number, block: ProgramBlock): void {
    block.mCode = mCode

    if (!SUPPORTED_M_CODES.includes(mCode)) {
      this.warn(block, `M${mCode} is outside the supported subset`)
    }
  }

  private removeComments(line: string): string {
    // Удаляем комментарии в скобках
    let result = line.replace(/\(.*?\)/g, '')

    // Удаляем комментарии с точкой с запятой
    const semicolonIndex = result.indexOf(';')
    if (semicolonIndex !== -1) {
      result = result.substring(0, semicolonIndex)
    }

    // Номер строки сам по себе ничего не делает
    return result.replace(/^N\d+\s*/i, '').trim()
  }

  // G92 sets coordinates without moving
  private isMove(block: ProgramBlock): boolean {
    const { x, y, z } = block.coordinates
    return (
      block.motion !== undefined &&
      !block.gCodes.includes(92) &&
      (x !== undefined || y !== undefined || z !== undefined)
    )
  }

  private validateBlock(block: ProgramBlock, explicitMotion: number | undefined): void {
    if ((explicitMotion === 0 || explicitMotion === 1) && !this.isMove(block)) {
      this.error(block, `G${explicitMotion} requires coordinates`)
    }

    if (explicitMotion === 2 || explicitMotion === 3) {
      const params = block.parameters ?? {}
      if (params.I === undefined && params.J === undefined && params.R === undefined) {
        this.error(block, `G${explicitMotion} requires I,J or R parameters`)
      }
    }
  }

  private validateFeedRate(block: ProgramBlock, feedRate: number): void {
    if (feedRate <= 0) {
      this.error(block, `Invalid feed rate: ${feedRate}. Must be positive.`)
    }
  }

  private validateProgram(blocks: ProgramBlock[]): void {
    const current: { [group: number]: string } = {}
    let hasProgramEnd = false

    for (const block of blocks) {
      // Единицы и режим координат меняться не должны
      for (const group of [3, 6]) {
        const value = block.modalGroups[group]
        if (!value) continue
        if (current[group] && current[group] !== value) {
          this.warnings.push({
            line: block.lineNumber,
            message: `Modal group ${group} changed from ${current[group]} to ${value}`,
            severity: 'info',
            code: block.original
          })
        }
        current[group] = value
      }

      if (block.modalGroups[3] === 'G91') {
        this.warn(block, 'Incremental mode (G91): positions are read as absolute')
      }
      if (block.mCode === 2 || block.mCode === 30) {
        hasProgramEnd = true
      }
    }

    if (!current[6]) {
      this.warnings.push({ line: 1, message: 'Program does not set units (G20/G21)', severity: 'warning', code: '' })
    }
    if (!hasProgramEnd) {
      this.warnings.push({ line: 1, message: 'Program has no program end (M2/M30)', severity: 'warning', code: '' })
    }
  }

  // True length of a G2/G3 move; also widens the bounding box to the arc's extreme points
  private arcLength(block: ProgramBlock, from: AxisPoint, to: AxisPoint, box: BoxBuilder): number {
    const params = block.parameters ?? {}
    if (params.I === undefined && params.J === undefined) {
      return distance3(from, to)
    }

    const center = { x: from.x + (params.I ?? 0), y: from.y + (params.J ?? 0) }
    const radius = Math.hypot(from.x - center.x, from.y - center.y)
    const endRadius = Math.hypot(to.x - center.x, to.y - center.y)
    if (Math.abs(endRadius - radius) > ARC_RADIUS_TOLERANCE) {
      this.warn(block, `Arc end radius ${endRadius.toFixed(4)} differs from start radius ${radius.toFixed(4)}`)
    }

    const clockwise = block.motion === 2
    const startAngle = Math.atan2(from.y - center.y, from.x - center.x)
    const endAngle = Math.atan2(to.y - center.y, to.x - center.x)
    let sweep = normalizeAngle(clockwise ? startAngle - endAngle : endAngle - startAngle)
    // Совпадающие начало и конец - полная окружность
    if (sweep < 1e-9) sweep = FULL_TURN

    for (let quadrant = 0; quadrant < 4; quadrant++) {
      const angle = (quadrant * Math.PI) / 2
      const offset = normalizeAngle(clockwise ? startAngle - angle : angle - startAngle)
      if (offset <= sweep) {
        box.add({ x: center.x + radius * Math.cos(angle), y: center.y + radius * Math.sin(angle), z: to.z })
      }
    }

    return Math.hypot(radius * sweep, to.z - from.z)
  }

  private lastUnits(blocks: ProgramBlock[]): 'millimeter' | 'inch' | null {
    let units: 'millimeter' | 'inch' | null = null
    for (const block of blocks) {
      if (block.modalGroups[6] === 'G20') units = 'inch'
      if (block.modalGroups[6] === 'G21') units = 'millimeter'
    }
    return units
  }

  private error(block: ProgramBlock, message: string): void {
    this.errors.push({ line: block.lineNumber, message, severity: 'error', code: block.original })
    block.isValid = false
  }

  private warn(block: ProgramBlock, message: string): void {
    this.warnings.push({ line: block.lineNumber, message, severity: 'warning', code: block.original })
  }
}

class BoxBuilder {
  private min: AxisPoint = { x: Infinity, y: Infinity, z: Infinity }
  private max: AxisPoint = { x: -Infinity, y: -Infinity, z: -Infinity }

  add(point: AxisPoint): void {
    this.min = { x: Math.min(this.min.x, point.x), y: Math.min(this.min.y, point.y), z: Math.min(this.min.z, point.z) }
    this.max = { x: Math.max(this.max.x, point.x), y: Math.max(this.max.y, point.y), z: Math.max(this.max.z, point.z) }
  }

  build(): BoundingBox {
    // Нет ни одного перемещения
    if (this.min.x === Infinity) {
      const zero = { x: 0, y: 0, z: 0 }
      return { min: zero, max: { ...zero }, size: { ...zero } }
    }
    return {
      min: this.min,
      max: this.max,
      size: { x: this.max.x - this.min.x, y: this.max.y - this.min.y, z: this.max.z - this.min.z }
    }
  }
}
