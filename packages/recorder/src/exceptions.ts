import { newEntityId } from './ids.js'
import type { ExceptionDescription, StackFrame } from './types.js'

export const MAX_STACK_FRAMES = 50

// "    at label (path:line:column)" or "    at path:line:column"
const FRAME_PATTERN = /^\s*at (?:(.+?) \()?(.+?):(\d+):\d+\)?$/

export function parseStackFrames(stack: string | undefined): Array<StackFrame> {
  if (!stack) return []

  const frames: Array<StackFrame> = []
  for (const line of stack.split(`\n`)) {
    const match = FRAME_PATTERN.exec(line)
    if (!match) continue
    const [, label, path, lineNumber] = match
    if (path === undefined) continue
    const frame: StackFrame = { path }
    if (lineNumber !== undefined) frame.line = Number(lineNumber)
    if (label !== undefined) frame.label = label
    frames.push(frame)
  }
  return frames
}

export function describeException(error: Error): ExceptionDescription {
  const frames = parseStackFrames(error.stack)
  const description: ExceptionDescription = {
    id: newEntityId(),
    type: error.name,
    message: error.message,
    stack: frames.slice(0, MAX_STACK_FRAMES),
  }
  if (frames.length > MAX_STACK_FRAMES) {
    description.truncated = frames.length - MAX_STACK_FRAMES
  }
  return description
}
