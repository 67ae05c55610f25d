import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from "@modelcontextprotocol/sdk/types.js";
import type { Config } from "./config/index.js";
import {
  AddMetadataSchema,
  DedupeMetadataSchema,
  GetMetadataSchema,
  MoveMetadataSchema,
  OrderMetadataSchema,
  RemoveEmptyMetadataSchema,
  RemoveMetadataSchema,
} from "./tools/definitions.js";
import {
  addMetadata,
  dedupeMetadata,
  formatReport,
  getMetadata,
  moveMetadata,
  orderMetadata,
  removeEmptyMetadata,
  removeMetadata,
  type ChangeReport,
} from "./tools/handlers.js";
import { logger } from "./utils/logger.js";

const stringList = { type: "array", items: { type: "string" } };
const kindProperty = {
  type: "string",
  enum: ["frontmatter", "inline", "all"],
  description: "Store to use: frontmatter, inline or all (default)",
};
const orderProperty = { type: "string", enum: ["asc", "desc"] };

const selectionProperties = {
  paths: {
    ...stringList,
    description: "Files or directories relative to the notes directory (defaults to all notes)",
  },
  recursive: { type: "boolean", description: "Descend into subdirectories" },
  startsWith: { type: "string", description: "Only notes whose file name starts with this" },
  endsWith: { type: "string", description: "Only notes whose file name ends with this" },
  pattern: { type: "string", description: "Only notes whose file name matches this regex" },
  hasMeta: {
    type: "array",
    description: "Metadata the notes must have",
    items: {
      type: "object",
      properties: { key: { type: "string" }, values: stringList, kind: kindProperty },
      required: ["key"],
    },
  },
};

const changeProperties = {
  ...selectionProperties,
  position: { type: "string", enum: ["top", "bottom"], description: "Where new inline fields go" },
  template: {
    type: "string",
    enum: ["standard", "callout"],
    description: "How inline fields are rendered",
  },
  inplace: { type: "boolean", description: "Rewrite inline fields where they stand" },
  dryRun: { type: "boolean", description: "Report the notes that would change, write nothing" },
};

type ToolResult = {
  content: Array<{ type: "text"; text: string }>;
  isError?: boolean;
};

export class NoteMetaServer {
  private server: Server;

  constructor(
    private readonly config: Config,
    version: string
  ) {
    this.server = new Server(
      {
        name: "notemeta",
        version,
      },
      {
        capabilities: {
          tools: {},
        },
      }
    );

    this.setupHandlers();
  }

  private report(report: ChangeReport): ToolResult {
    return {
      content: [{ type: "text", text: formatReport(this.config, report) }],
      isError: report.failures.length > 0 ? true : undefined,
    };
  }

  /** Dispatch one tool call. Exposed apart from the transport so it can be driven directly. */
  callTool(name: string, args: unknown): ToolResult {
    try {
      switch (name) {
        case "get_metadata": {
          const input = GetMetadataSchema.parse(args ?? {});
          const result = getMetadata(this.config, input);
          if (result.notes.length === 0 && result.failures.length === 0) {
            return { content: [{ type: "text", text: "No notes matched the selection." }] };
          }
          return {
            content: [{ type: "text", text: JSON.stringify(result.notes, null, 2) }],
            isError: result.failures.length > 0 ? true : undefined,
          };
        }

        case "add_metadata":
          return this.report(addMetadata(this.config, AddMetadataSchema.parse(args)));

        case "remove_metadata":
          return this.report(removeMetadata(this.config, RemoveMetadataSchema.parse(args)));

        case "move_metadata":
          return this.report(moveMetadata(this.config, MoveMetadataSchema.parse(args)));

        case "dedupe_metadata":
          return this.report(dedupeMetadata(this.config, DedupeMetadataSchema.parse(args ?? {})));

        case "order_metadata":
          return this.report(orderMetadata(this.config, OrderMetadataSchema.parse(args ?? {})));

        case "remove_empty_metadata":
          return this.report(
            removeEmptyMetadata(this.config, RemoveEmptyMetadataSchema.parse(args ?? {}))
          );

        default:
          return {
            content: [{ type: "text", text: `Unknown tool: ${name}` }],
            isError: true,
          };
      }
    } catch (error) {
      return {
        content: [
          {
            type: "text",
            text: `Error: ${error instanceof Error ? error.message : String(error)}`,
          },
        ],
        isError: true,
      };
    }
  }

  private setupHandlers(): void {
    this.server.setRequestHandler(ListToolsRequestSchema, async () => ({
      tools: [
        {
          name: "get_metadata",
          description:
            "Read the frontmatter and inline (key :: value) metadata of the selected notes.",
          inputSchema: {
            type: "object",
            properties: {
              ...selectionProperties,
              keys: { ...stringList, description: "Keys to return (defaults to every key)" },
              kind: kindProperty,
            },
          },
        },
        {
          name: "add_metadata",
          description:
            "Add a key or values to the selected notes. A key already present is extended where it is; a new key goes to the configured default kind unless a kind is given.",
          inputSchema: {
            type: "object",
            properties: {
              ...changeProperties,
              key: { type: "string", description: "Metadata key" },
              values: { ...stringList, description: "Values to add" },
              kind: kindProperty,
              overwrite: { type: "boolean", description: "Replace the existing values" },
            },
            required: ["key"],
          },
        },
        {
          name: "remove_metadata",
          description:
            "Remove values of a key, or the key itself when no values are given, from the selected notes.",
          inputSchema: {
            type: "object",
            properties: {
              ...changeProperties,
              key: { type: "string", description: "Metadata key" },
              values: { ...stringList, description: "Values to remove" },
              kind: kindProperty,
            },
            required: ["key"],
          },
        },
        {
          name: "move_metadata",
          description: "Move keys between the frontmatter and the inline fields of the selected notes.",
          inputSchema: {
            type: "object",
            properties: {
              ...changeProperties,
              keys: { ...stringList, description: "Keys to move (defaults to every key)" },
              from: { type: "string", enum: ["frontmatter", "inline"] },
              to: { type: "string", enum: ["frontmatter", "inline"] },
            },
            required: ["from", "to"],
          },
        },
        {
          name: "dedupe_metadata",
          description: "Remove duplicate values, keeping the first occurrence of each.",
          inputSchema: {
            type: "object",
            properties: {
              ...changeProperties,
              keys: { ...stringList, description: "Keys to deduplicate (defaults to every key)" },
              kind: kindProperty,
            },
          },
        },
        {
          name: "order_metadata",
          description: "Sort keys and/or the values of keys in the selected notes.",
          inputSchema: {
            type: "object",
            properties: {
              ...changeProperties,
              keys: { ...stringList, description: "Keys whose values are sorted (default: all)" },
              keyOrder: { ...orderProperty, description: "Sort the keys themselves" },
              valueOrder: { ...orderProperty, description: "Sort the values" },
              kind: kindProperty,
            },
          },
        },
        {
          name: "remove_empty_metadata",
          description: "Delete every key that has no values.",
          inputSchema: {
            type: "object",
            properties: {
              ...changeProperties,
              kind: kindProperty,
            },
          },
        },
      ],
    }));

    this.server.setRequestHandler(CallToolRequestSchema, async (request) => {
      const { name, arguments: args } = request.params;
      logger.debug(`tool call ${name}`);
      return this.callTool(name, args);
    });
  }

  async run(): Promise<void> {
    const transport = new StdioServerTransport();
    await this.server.connect(transport);
    logger.info("notemeta MCP server running on stdio");
  }
}
