import type { Tool } from './tool.js'
import type { ToolSpec } from './types.js'

/**
 * Registry for managing Tool instances by name.
 *
 * The MCP server lists and dispatches through a registry, and embedders can
 * build their own with any subset of the book and blog tools.
 *
 * @example
 * ```typescript
 * const registry = new ToolRegistry()
 * registry.register(createBookTools(deps))
 * registry.register(createBlogTools(client))
 *
 * const getPage = registry.get('get_page')
 * registry.remove('apply_renumbering')
 * ```
 */
export class ToolRegistry {
  private readonly _tools: Map<string, Tool>

  constructor() {
    this._tools = new Map()
  }

  /**
   * Registers one or more tools with the registry.
   *
   * @param tool - Single Tool instance or array of Tool instances to register
   * @throws If a tool with duplicate name already exists
   * @throws If tool name is empty
   */
  public register(tool: Tool | Tool[]): void {
    const tools = Array.isArray(tool) ? tool : [tool]

    for (const t of tools) {
      this._validateName(t)

      if (this._tools.has(t.name)) {
        throw new Error(`Tool with name '${t.name}' already registered`)
      }

      this._tools.set(t.name, t)
    }
  }

  /**
   * Retrieves a tool by its unique name.
   *
   * @throws If tool with given name doesn't exist
   */
  public get(name: string): Tool {
    const tool = this._tools.get(name)

    if (!tool) {
      throw new Error(`Tool with name '${name}' not found`)
    }

    return tool
  }

  /**
   * Whether a tool with this name is registered.
   */
  public has(name: string): boolean {
    return this._tools.has(name)
  }

  /**
   * Replaces an existing tool registration.
   *
   * @throws If tool with given name doesn't exist
   * @throws If the new tool's name doesn't match the parameter name
   */
  public update(name: string, tool: Tool): void {
    this._validateName(tool)

    if (!this._tools.has(name)) {
      throw new Error(`Tool with name '${name}' not found`)
    }

    if (tool.name !== name) {
      throw new Error(`Tool name '${tool.name}' does not match parameter name '${name}'`)
    }

    this._tools.set(name, tool)
  }

  /**
   * Removes a tool from the registry.
   *
   * @throws If tool with given name doesn't exist
   */
  public remove(name: string): void {
    if (!this._tools.delete(name)) {
      throw new Error(`Tool with name '${name}' not found`)
    }
  }

  /**
   * Returns all registered tools in registration order.
   */
  public list(): Tool[] {
    return Array.from(this._tools.values())
  }

  /**
   * Returns the specifications of all registered tools in registration order.
   */
  public specs(): ToolSpec[] {
    return this.list().map((tool) => tool.toolSpec)
  }

  private _validateName(tool: Tool): void {
    if (tool.name.trim() === '') {
      throw new Error('Tool name must be a non-empty string')
    }
  }
}
