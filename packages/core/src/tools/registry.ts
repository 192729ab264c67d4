import { UnknownToolError } from '../errors'
import { SUPPORT_TOOLS } from './support-tools'
import type { RegisteredTool } from './types'

/**
 * Immutable name → tool table. Built once at startup; lookups never write.
 */
export interface ToolRegistry {
  get(name: string): RegisteredTool
  has(name: string): boolean
  list(): readonly RegisteredTool[]
}

export function createToolRegistry(
  tools: readonly RegisteredTool[] = SUPPORT_TOOLS
): ToolRegistry {
  const table = new Map<string, RegisteredTool>()
  for (const tool of tools) {
    if (table.has(tool.name)) {
      throw new Error(`Duplicate tool name: ${tool.name}`)
    }
    table.set(tool.name, tool)
  }
  const listed = Object.freeze([...table.values()])

  return Object.freeze({
    get(name: string) {
      const tool = table.get(name)
      if (!tool) throw new UnknownToolError(name)
      return tool
    },
    has(name: string) {
      return table.has(name)
    },
    list() {
      return listed
    },
  })
}
