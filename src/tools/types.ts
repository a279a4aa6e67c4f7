// src/tools/types.ts

/**
 * Tool category, used to switch whole groups on or off
 */
export type ToolCategory =
  | "read" // Queries that never change the store
  | "write"; // Inserts

/**
 * Tool execution function type. Arguments arrive exactly as the caller
 * sent them; each tool validates its own input.
 */
export type ToolFunction = (
  args: Record<string, unknown>,
) => Promise<unknown> | unknown;

export interface JsonSchemaProperty {
  type: "string" | "integer" | "number" | "boolean";
  description?: string;
  minimum?: number;
  maximum?: number;
  minLength?: number;
}

export interface ToolInputSchema {
  type: "object";
  properties: Record<string, JsonSchemaProperty>;
  required?: string[];
}

/**
 * Complete tool definition including execution function
 */
export interface ToolDefinition {
  name: string;
  description: string;
  category: ToolCategory;
  input_schema: ToolInputSchema;
  function: ToolFunction;
  enabled?: boolean; // Default: true
}

/**
 * What the protocol layer needs to advertise a tool
 */
export interface ToolDescriptor {
  name: string;
  description: string;
  inputSchema: ToolInputSchema;
}

export interface ToolStats {
  total: number;
  enabled: number;
  disabled: number;
  byCategory: Record<ToolCategory, number>;
}

export interface ToolFilter {
  category?: ToolCategory;
  enabled?: boolean;
  namePattern?: string;
}

// MCP tool names: letters, digits, underscore, hyphen
export const TOOL_NAME_PATTERN = /^[A-Za-z0-9_-]{1,64}$/;

/**
 * Convert ToolDefinition to the MCP tools/list format
 */
export function toDescriptor(def: ToolDefinition): ToolDescriptor {
  return {
    name: def.name,
    description: def.description,
    inputSchema: def.input_schema,
  };
}
