import { registry as defaultRegistry, ToolRegistry } from "./registry";
import { createDataTools } from "./data";
import { PeopleStore } from "../data/people";
import { logger } from "../utils/logger";

export interface LoadToolsOptions {
  /** Register write tools disabled */
  readOnly?: boolean;
  registry?: ToolRegistry;
}

/**
 * Registers every tool the host exposes.
 * Called once during tool-host startup.
 */
export function loadAllTools(
  people: PeopleStore,
  options: LoadToolsOptions = {},
): ToolRegistry {
  const registry = options.registry ?? defaultRegistry;

  if (registry.isInitialized()) {
    logger.warn("Tools already loaded, skipping re-initialization");
    return registry;
  }

  logger.info("Loading all tools...");

  registry.registerBulk(createDataTools(people));

  if (options.readOnly) {
    for (const tool of registry.list({ category: "write" })) {
      registry.disable(tool.name);
    }
  }

  registry.markInitialized();

  const stats = registry.getStats();
  logger.success(
    `✅ Tools loaded: ${stats.enabled} enabled, ${stats.disabled} disabled`,
  );
  logger.info(
    `By category: read=${stats.byCategory.read}, write=${stats.byCategory.write}`,
  );

  return registry;
}
