import express from "express";
import cors from "cors";
import { randomUUID } from "crypto";
import type { Request, Response } from "express";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import { loadConfig } from "./config.js";
import { createLogger, setLogLevel } from "./logger.js";
import { createPomodoroRuntime, createPomodoroServer } from "./server.js";

const logger = createLogger("http");

async function bootstrap() {
  const config = loadConfig();
  setLogLevel(config.logLevel);
  const runtime = createPomodoroRuntime({ config });

  const app = express();
  app.use(express.json({ limit: "1mb" }));
  app.use(
    cors({
      origin: "*",
      exposedHeaders: ["Mcp-Session-Id"]
    })
  );

  const sessions = new Map<string, StreamableHTTPServerTransport>();

  const openSession = async () => {
    const transport = new StreamableHTTPServerTransport({
      sessionIdGenerator: () => randomUUID(),
      onsessioninitialized: sessionId => {
        sessions.set(sessionId, transport);
      },
      onsessionclosed: sessionId => {
        sessions.delete(sessionId);
      }
    });
    transport.onclose = () => {
      if (transport.sessionId) {
        sessions.delete(transport.sessionId);
      }
    };

    const { server } = createPomodoroServer({ runtime });
    await server.connect(transport);
    return transport;
  };

  // Resolves the session named by the request header, answering 400/404 itself when there is none.
  const findSession = (req: Request, res: Response): StreamableHTTPServerTransport | undefined => {
    const sessionId = req.header("mcp-session-id");
    if (!sessionId) {
      res.status(400).json({ error: "missing_session", message: "Provide an Mcp-Session-Id header." });
      return undefined;
    }
    const transport = sessions.get(sessionId);
    if (!transport) {
      res.status(404).json({ error: "unknown_session", message: "Session not found. Start a new session to initialize." });
      return undefined;
    }
    return transport;
  };

  const failWith = (res: Response, message: string, error: unknown) => {
    logger.error(message, error);
    if (!res.headersSent) {
      res.status(500).json({ error: "internal_error", message });
    }
  };

  app.get("/healthz", (_req: Request, res: Response) => {
    res.json({ status: "ok", sessions: sessions.size, activeRuns: runtime.toolset.registry.size });
  });

  app.post("/mcp", async (req: Request, res: Response) => {
    try {
      if (req.header("mcp-session-id")) {
        const transport = findSession(req, res);
        if (transport) {
          await transport.handleRequest(req, res, req.body);
        }
        return;
      }

      const transport = await openSession();
      await transport.handleRequest(req, res, req.body);
    } catch (error) {
      failWith(res, "Failed to handle MCP request.", error);
    }
  });

  app.get("/mcp", async (req: Request, res: Response) => {
    const transport = findSession(req, res);
    if (!transport) {
      return;
    }
    try {
      await transport.handleRequest(req, res);
    } catch (error) {
      failWith(res, "Failed to stream MCP updates.", error);
    }
  });

  app.delete("/mcp", async (req: Request, res: Response) => {
    const transport = findSession(req, res);
    if (!transport) {
      return;
    }
    try {
      await transport.handleRequest(req, res);
    } catch (error) {
      failWith(res, "Failed to close MCP session.", error);
    } finally {
      if (transport.sessionId) {
        sessions.delete(transport.sessionId);
      }
    }
  });

  const listener = app.listen(config.port, () => {
    logger.info(`Pomodoro MCP server listening on port ${config.port}`);
  });

  const shutdown = async () => {
    logger.info("Shutting down...");
    const cancelled = runtime.toolset.registry.cancelAll();
    if (cancelled > 0) {
      logger.info(`Cancelled ${cancelled} active run(s)`);
    }
    listener.close();
    await Promise.all(
      [...sessions.values()].map(async transport => {
        try {
          await transport.close();
        } catch (error) {
          logger.error("Error closing transport", error);
        }
      })
    );
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch(error => {
      logger.error("Shutdown failed", error);
      process.exit(1);
    });
  };
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);
}

bootstrap().catch(error => {
  logger.error("Failed to start Pomodoro MCP server", error);
  process.exit(1);
});
