// Типы для чтения сгенерированных программ
export interface Coordinates {
  x?: number
  y?: number
  z?: number
  e?: number
}

export interface AxisPoint {
  x: number
  y: number
  z: number
}

export interface ProgramBlock {
  lineNumber: number
  original: string
  code: string
  gCodes: number[]
  // active motion mode after this block (G0..G3), modal across blocks
  motion?: number
  mCode?: number
  modalGroups: { [group: number]: string }
  coordinates: Coordinates
  feedRate?: number
  spindleSpeed?: number
  toolNumber?: number
  parameters?: { [key: string]: number }
  // absolute position after the block has run
  position: AxisPoint
  isValid: boolean
}

export interface ReadIssue {
  line: number
  message: string
  severity: 'error' | 'warning' | 'info'
  code: string
}

export interface ReadWarning extends ReadIssue {
  severity: 'warning' | 'info'
}

export interface BoundingBox {
  min: AxisPoint
  max: AxisPoint
  size: AxisPoint
}

export interface ProgramSummary {
  success: boolean
  blocks: ProgramBlock[]
  errors: ReadIssue[]
  warnings: ReadWarning[]
  lineCount: number
  blockCount: number
  commentCount: number
  motionCounts: { G0: number; G1: number; G2: number; G3: number }
  units: 'millimeter' | 'inch' | null
  // distance covered by rapid and by feed moves
  pathLength: { rapid: number; feed: number }
  estimatedTime: number // секунды
  boundingBox: BoundingBox
}

export interface ReaderOptions {
  // assumed speed of G0 moves, units per minute
  rapidRate: number
}
