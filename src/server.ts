import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { SERVER_INFO, loadConfig, type AppConfig } from "./config.js";
import { createLogger } from "./logger.js";
import { MessageBoard, type RenderedMessage } from "./state/messageBoard.js";
import { PomodoroToolset, intervalKindSchema, setIntervalShape } from "./tools/pomodoroTool.js";
import type { MessageView, Sleep } from "./types.js";

const logger = createLogger("server");

export interface PomodoroServerContext {
  server: McpServer;
  toolset: PomodoroToolset;
  board: MessageBoard;
}

export interface PomodoroRuntime {
  toolset: PomodoroToolset;
  board: MessageBoard;
}

export interface PomodoroServerOptions {
  config?: AppConfig;
  sleep?: Sleep;
  runtime?: PomodoroRuntime;
}

const userShape = {
  userId: z.number().int().nonnegative().describe("Opaque numeric user id supplied by the chat transport."),
  chatId: z.number().int().optional().describe("Chat to render messages into. Defaults to the user id.")
};

/** State shared by every MCP session: one store, one registry, one message board. */
export function createPomodoroRuntime(options: Omit<PomodoroServerOptions, "runtime"> = {}): PomodoroRuntime {
  const config = options.config ?? loadConfig();
  const board = new MessageBoard({ historyLimit: config.messageHistoryLimit });
  const toolset = new PomodoroToolset({
    notifier: board,
    tickSeconds: config.tickSeconds,
    sleep: options.sleep,
    onCycleEvent: (userId, event) => {
      if (event.type === "phase") {
        logger.debug(`User ${userId} entered ${event.phase} (${event.durationSeconds}s)`);
      }
    }
  });
  return { toolset, board };
}

export function createPomodoroServer(options: PomodoroServerOptions = {}): PomodoroServerContext {
  const { toolset, board } = options.runtime ?? createPomodoroRuntime(options);

  const server = new McpServer(
    {
      name: SERVER_INFO.name,
      version: SERVER_INFO.version
    },
    {
      capabilities: {
        logging: {}
      }
    }
  );

  server.registerTool(
    "start_timer",
    {
      title: "Start timer",
      description: "Run a single Pomodoro or break using the user's configured duration.",
      inputSchema: {
        ...userShape,
        kind: intervalKindSchema.optional()
      },
      annotations: { readOnlyHint: false }
    },
    async input => {
      const result = await toolset.startTimer(input);
      return buildResult(result.message, {
        status: result.status,
        runId: result.status === "started" ? result.runId : undefined
      });
    }
  );

  server.registerTool(
    "start_cycle",
    {
      title: "Start Pomodoro cycle",
      description: "Run Pomodoros and breaks back to back until stopped. Every 4th break is long.",
      inputSchema: userShape,
      annotations: { readOnlyHint: false }
    },
    async input => {
      const result = await toolset.startCycle(input);
      return buildResult(result.message, {
        status: result.status,
        runId: result.status === "started" ? result.runId : undefined
      });
    }
  );

  server.registerTool(
    "stop_run",
    {
      title: "Stop timer or cycle",
      description: "Stop the user's running timer or cycle.",
      inputSchema: { userId: userShape.userId },
      annotations: { readOnlyHint: false }
    },
    async input => {
      const result = await toolset.stopRun(input);
      return buildResult(result.message, {
        status: result.status,
        view: result.status === "stopped" ? result.view : undefined
      });
    }
  );

  server.registerTool(
    "set_interval",
    {
      title: "Set interval",
      description: "Change a Pomodoro or break length in minutes. Omit minutes to see the current value.",
      inputSchema: setIntervalShape,
      annotations: { readOnlyHint: false }
    },
    async input => {
      const result = await toolset.setInterval(input);
      return buildResult(result.message, {
        status: result.status,
        intervals: result.status === "ok" ? result.intervals : undefined
      });
    }
  );

  server.registerTool(
    "stats",
    {
      title: "Statistics",
      description: "Completed Pomodoros and breaks for a user.",
      inputSchema: { userId: userShape.userId },
      annotations: { readOnlyHint: true }
    },
    async input => {
      const { stats, intervals, view } = await toolset.queryStats(input);
      return buildViewResult(view, { stats, intervals });
    }
  );

  server.registerTool(
    "intervals",
    {
      title: "Intervals",
      description: "Configured interval lengths and the main menu.",
      inputSchema: { userId: userShape.userId },
      annotations: { readOnlyHint: true }
    },
    async input => {
      const { intervals, view } = await toolset.queryIntervals(input);
      return buildViewResult(view, { intervals });
    }
  );

  server.registerTool(
    "menu",
    {
      title: "Welcome",
      description: "Welcome screen with the configured durations and the main controls.",
      inputSchema: { userId: userShape.userId },
      annotations: { readOnlyHint: true }
    },
    async input => buildViewResult(await toolset.showMenu(input), {})
  );

  server.registerTool(
    "help",
    {
      title: "Help",
      description: "How to use the Pomodoro timer.",
      inputSchema: { userId: userShape.userId },
      annotations: { readOnlyHint: true }
    },
    async input => buildViewResult(await toolset.showHelp(input), {})
  );

  server.registerTool(
    "messages",
    {
      title: "Messages",
      description: "Messages rendered into a chat, oldest first, including live countdowns.",
      inputSchema: {
        chatId: z.number().int(),
        limit: z.number().int().positive().max(50).optional()
      },
      annotations: { readOnlyHint: true }
    },
    async ({ chatId, limit }) => {
      const messages = board.list(chatId).slice(-(limit ?? 10));
      const text = messages.length === 0 ? "No messages yet." : messages.map(message => message.text).join("\n\n---\n\n");
      return buildResult(text, { messages: messages.map(serializeMessage) });
    }
  );

  return {
    server,
    toolset,
    board
  };
}

function buildResult(message: string, structuredContent: Record<string, unknown>) {
  return {
    content: [
      {
        type: "text" as const,
        text: message
      }
    ],
    structuredContent
  };
}

function buildViewResult(view: MessageView, structuredContent: Record<string, unknown>) {
  return buildResult(view.text, { ...structuredContent, controls: view.controls });
}

function serializeMessage(message: RenderedMessage): Record<string, unknown> {
  return {
    id: message.id,
    text: message.text,
    controls: message.controls,
    createdAt: message.createdAt,
    updatedAt: message.updatedAt
  };
}
