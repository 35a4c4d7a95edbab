import { CommandExecutionError, type CommandRunner } from "@orgdeps/repo-workspace";
import type { TokenValidation } from "@orgdeps/registry-client";
import { createSilentLogger, type Logger } from "./logger.js";

export const REQUIRED_TOOLS = ["node", "npm", "git"] as const;

export type RequiredTool = (typeof REQUIRED_TOOLS)[number];

export type ToolCheck =
  | { tool: RequiredTool; available: true; version: string }
  | { tool: RequiredTool; available: false; reason: string };

export type TokenCheck =
  | { status: "missing" }
  | { status: "valid"; login: string | null }
  | { status: "invalid"; httpStatus: number }
  | { status: "unverified"; reason: string };

export type EnvironmentCheck = {
  tools: readonly ToolCheck[];
  token: TokenCheck;
  ok: boolean;
};

export type TokenValidator = {
  readonly authenticated: boolean;
  validateToken(): Promise<TokenValidation>;
};

export const checkTool = async (runner: CommandRunner, tool: RequiredTool): Promise<ToolCheck> => {
  try {
    const result = await runner.run(tool, ["--version"]);
    if (result.exitCode !== 0) {
      return { tool, available: false, reason: `exited with code ${result.exitCode}` };
    }

    return { tool, available: true, version: result.stdout.trim() };
  } catch (error) {
    if (error instanceof CommandExecutionError) {
      return { tool, available: false, reason: error.message };
    }
    throw error;
  }
};

export const checkToken = async (validator: TokenValidator): Promise<TokenCheck> => {
  if (!validator.authenticated) {
    return { status: "missing" };
  }

  const validation = await validator.validateToken();
  if (validation.valid) {
    return { status: "valid", login: validation.login };
  }

  // Status 0: GitHub was not reached, so the token is neither accepted nor rejected.
  return validation.status === 0
    ? { status: "unverified", reason: validation.reason }
    : { status: "invalid", httpStatus: validation.status };
};

/** A missing token is reported but does not fail the check. */
export const runCheckCommand = async (
  runner: CommandRunner,
  validator: TokenValidator,
  logger: Logger = createSilentLogger(),
): Promise<EnvironmentCheck> => {
  const tools: ToolCheck[] = [];
  for (const tool of REQUIRED_TOOLS) {
    const check = await checkTool(runner, tool);
    if (check.available) {
      logger.debug(`${tool} found: ${check.version}`);
    } else {
      logger.error(`${tool} is not available (${check.reason})`);
    }
    tools.push(check);
  }

  const token = await checkToken(validator);
  switch (token.status) {
    case "missing":
      logger.warn("GITHUB_TOKEN is not set; requests are unauthenticated and rate limited");
      break;
    case "valid":
      logger.info(`GitHub token is valid${token.login === null ? "" : ` (${token.login})`}`);
      break;
    case "invalid":
      logger.error(`GitHub token is invalid (status ${token.httpStatus})`);
      break;
    case "unverified":
      logger.error(`GitHub token could not be verified (${token.reason})`);
      break;
  }

  return {
    tools,
    token,
    ok: tools.every((check) => check.available) && (token.status === "missing" || token.status === "valid"),
  };
};

export const formatCheckOutput = (check: EnvironmentCheck): string => {
  const lines = check.tools.map((tool) =>
    tool.available ? `${tool.tool}: ${tool.version}` : `${tool.tool}: missing (${tool.reason})`,
  );

  switch (check.token.status) {
    case "missing":
      lines.push("token: not set");
      break;
    case "valid":
      lines.push(`token: valid${check.token.login === null ? "" : ` (${check.token.login})`}`);
      break;
    case "invalid":
      lines.push(`token: invalid (status ${check.token.httpStatus})`);
      break;
    case "unverified":
      lines.push(`token: unverified (${check.token.reason})`);
      break;
  }

  return lines.join("\n");
};
