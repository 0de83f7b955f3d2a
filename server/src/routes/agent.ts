import { Router, type Request, type Response } from "express";
import { runAutomation, type AutomationDeps, type AutomationRequest } from "../automation.js";
import {
  ConfigurationError,
  InvalidRequestError,
  TransportError,
  VersionControlError,
  errorMessage,
} from "../errors.js";
import { InstructionRequestSchema, parseBody } from "./schemas.js";

export type AgentRouteHandler = (req: Request, res: Response) => Promise<void>;

export interface AgentHandlers {
  instruction: AgentRouteHandler;
  instructionTest: AgentRouteHandler;
  repository: AgentRouteHandler;
}

function sendFailure(res: Response, err: unknown): void {
  if (err instanceof ConfigurationError || err instanceof InvalidRequestError) {
    res.status(400).json({ detail: err.message });
    return;
  }
  if (err instanceof VersionControlError) {
    console.error(`[agent] git failure: ${err.message}`);
    res.status(500).json({ detail: `Git operation failed: ${err.message}` });
    return;
  }
  if (err instanceof TransportError) {
    console.error(`[agent] upstream failure: ${err.message}`);
    res.status(err.status).json({ detail: `Upstream request failed: ${err.message}` });
    return;
  }
  const message = errorMessage(err);
  console.error(`[agent] run failed: ${message}`);
  res.status(500).json({ detail: `Operation failed: ${message}` });
}

export function createAgentHandlers(deps: AutomationDeps): AgentHandlers {
  const run = async (res: Response, request: AutomationRequest): Promise<void> => {
    try {
      const { result } = await runAutomation(deps, request);
      res.json(result);
    } catch (err: unknown) {
      sendFailure(res, err);
    }
  };

  const instructionHandler =
    (workingDir: string, mode: AutomationRequest["mode"], runAgent: boolean): AgentRouteHandler =>
    async (req, res) => {
      let instruction: string;
      try {
        ({ instruction } = parseBody(InstructionRequestSchema, req.body));
      } catch (err: unknown) {
        sendFailure(res, err);
        return;
      }
      await run(res, { instruction, workingDir, mode, runAgent });
    };

  return {
    // POST /api/agent/instruction { instruction }
    instruction: instructionHandler(deps.config.workDir, "fresh", true),
    // POST /api/agent/instruction-test { instruction }
    instructionTest: instructionHandler(deps.config.testWorkDir, "fresh", true),
    // POST /api/agent/repository { instruction }: branch + PR, no agent run
    repository: instructionHandler(deps.config.workDir, "reuse", false),
  };
}

export function createAgentRouter(deps: AutomationDeps): Router {
  const router = Router();
  const handlers = createAgentHandlers(deps);
  router.post("/instruction", handlers.instruction);
  router.post("/instruction-test", handlers.instructionTest);
  router.post("/repository", handlers.repository);
  return router;
}
