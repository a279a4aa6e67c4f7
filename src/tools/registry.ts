// src/tools/registry.ts

import { logger } from "../utils/logger";
import {
  ToolDefinition,
  ToolDescriptor,
  ToolStats,
  ToolFilter,
  ToolCategory,
  TOOL_NAME_PATTERN,
  toDescriptor,
} from "./types";

/**
 * Central registry for the tools the MCP host advertises.
 * Single source of truth for tool definitions; the server builds its
 * protocol handlers from whatever is enabled here.
 */
export class ToolRegistry {
  private tools = new Map<string, ToolDefinition>();
  private initialized = false;

  /**
   * Register a single tool
   */
  register(tool: ToolDefinition): void {
    if (this.tools.has(tool.name)) {
      throw new Error(
        `Tool registration conflict: '${tool.name}' already exists`,
      );
    }

    if (!TOOL_NAME_PATTERN.test(tool.name)) {
      throw new Error(
        `Tool '${tool.name}' has an invalid name (letters, digits, _ and - only)`,
      );
    }

    const entry: ToolDefinition = { ...tool, enabled: tool.enabled ?? true };
    this.tools.set(entry.name, entry);
    logger.debug(
      `Registered tool: ${entry.name} (category: ${entry.category}, enabled: ${entry.enabled})`,
    );
  }

  registerBulk(tools: ToolDefinition[]): void {
    for (const tool of tools) {
      this.register(tool);
    }
  }

  /**
   * Descriptors of the enabled tools, for the protocol layer
   */
  getDefinitions(filter?: ToolFilter): ToolDescriptor[] {
    return this.getEnabled(filter).map(toDescriptor);
  }

  getEnabled(filter?: ToolFilter): ToolDefinition[] {
    return Array.from(this.tools.values()).filter(
      (tool) => this.matchesFilter(tool, filter) && tool.enabled !== false,
    );
  }

  /**
   * Look up a tool by name, enabled or not
   */
  getTool(name: string): ToolDefinition | undefined {
    return this.tools.get(name);
  }

  /**
   * All tools with their enabled state (for /health and the loader)
   */
  list(filter?: ToolFilter): Array<{
    name: string;
    category: ToolCategory;
    enabled: boolean;
    description: string;
  }> {
    return Array.from(this.tools.values())
      .filter((tool) => this.matchesFilter(tool, filter))
      .map((tool) => ({
        name: tool.name,
        category: tool.category,
        enabled: tool.enabled !== false,
        description: tool.description,
      }));
  }

  disable(name: string): boolean {
    const tool = this.tools.get(name);
    if (!tool) return false;

    tool.enabled = false;
    logger.info(`Disabled tool: ${name}`);
    return true;
  }

  isEnabled(name: string): boolean {
    const tool = this.tools.get(name);
    return tool ? tool.enabled !== false : false;
  }

  getStats(): ToolStats {
    const stats: ToolStats = {
      total: this.tools.size,
      enabled: 0,
      disabled: 0,
      byCategory: { read: 0, write: 0 },
    };

    for (const tool of this.tools.values()) {
      if (tool.enabled !== false) {
        stats.enabled++;
      } else {
        stats.disabled++;
      }
      stats.byCategory[tool.category]++;
    }

    return stats;
  }

  /**
   * Clear all registered tools (for testing)
   */
  clear(): void {
    this.tools.clear();
    this.initialized = false;
    logger.debug("Registry cleared");
  }

  markInitialized(): void {
    this.initialized = true;
    logger.info(
      `Tool registry initialized: ${this.tools.size} tools registered`,
    );
  }

  isInitialized(): boolean {
    return this.initialized;
  }

  private matchesFilter(tool: ToolDefinition, filter?: ToolFilter): boolean {
    if (!filter) return true;

    if (filter.category && tool.category !== filter.category) {
      return false;
    }

    if (
      filter.enabled !== undefined &&
      (tool.enabled !== false) !== filter.enabled
    ) {
      return false;
    }

    if (filter.namePattern) {
      const regex = new RegExp(filter.namePattern, "i");
      if (!regex.test(tool.name)) {
        return false;
      }
    }

    return true;
  }
}

// Singleton instance
export const registry = new ToolRegistry();
