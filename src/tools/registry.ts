import { z } from 'zod';
import { JsonSchemaObject, ToolSpec } from '../types/agent';
import { errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';

const TOOL_NAME_PATTERN = /^[a-zA-Z0-9_-]{1,64}$/;

export interface ToolDefinition<S extends z.AnyZodObject> {
  name: string;
  description: string;
  schema: S;
  /** JSON schema advertised to the model; must describe the same fields as `schema`. */
  parameters: JsonSchemaObject;
  handler: (args: z.infer<S>) => Promise<string>;
}

export interface RegisteredTool {
  spec: ToolSpec;
  schemaKeys: string[];
  invoke(args: unknown): Promise<string>;
}

export function defineTool<S extends z.AnyZodObject>(definition: ToolDefinition<S>): RegisteredTool {
  const { name, description, schema, parameters, handler } = definition;

  return {
    spec: { name, description, parameters },
    schemaKeys: Object.keys(schema.shape),
    async invoke(args: unknown): Promise<string> {
      const parsed = schema.safeParse(args ?? {});
      if (!parsed.success) {
        const issues = parsed.error.issues.map((i) => `${i.path.join('.') || 'arguments'}: ${i.message}`);
        logger.warn('Tool called with invalid arguments', { tool: name, issues });
        return `Invalid arguments for ${name}: ${issues.join('; ')}`;
      }

      try {
        return await handler(parsed.data);
      } catch (error) {
        logger.error('Tool handler failed', { tool: name, error: errorMessage(error) });
        return `Error running ${name}: ${errorMessage(error)}`;
      }
    },
  };
}

/**
 * Closed name → handler table. Everything that could go wrong with a tool's
 * declaration is checked here, once, instead of on each call.
 */
export class ToolRegistry {
  private readonly tools = new Map<string, RegisteredTool>();

  constructor(tools: RegisteredTool[]) {
    for (const tool of tools) {
      const { name, parameters } = tool.spec;

      if (!TOOL_NAME_PATTERN.test(name)) {
        throw new Error(`Invalid tool name: ${name}`);
      }
      if (this.tools.has(name)) {
        throw new Error(`Duplicate tool name: ${name}`);
      }

      const advertised = Object.keys(parameters.properties).sort();
      const accepted = [...tool.schemaKeys].sort();
      if (advertised.join(',') !== accepted.join(',')) {
        throw new Error(
          `Tool ${name} advertises [${advertised.join(', ')}] but validates [${accepted.join(', ')}]`
        );
      }

      const unknownRequired = parameters.required.filter((key) => !(key in parameters.properties));
      if (unknownRequired.length > 0) {
        throw new Error(`Tool ${name} requires undeclared parameters: ${unknownRequired.join(', ')}`);
      }

      this.tools.set(name, tool);
    }
  }

  specs(): ToolSpec[] {
    return [...this.tools.values()].map((tool) => tool.spec);
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  async invoke(name: string, args: unknown): Promise<string> {
    const tool = this.tools.get(name);
    if (!tool) {
      logger.warn('Agent requested unknown tool', { tool: name });
      return `Unknown tool: ${name}. Available tools: ${[...this.tools.keys()].join(', ')}`;
    }

    logger.info('Invoking tool', { tool: name });
    return tool.invoke(args);
  }
}
