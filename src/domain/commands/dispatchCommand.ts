import { GameRuleError } from "../errors/GameRuleError.js";
import { isExpectedError } from "../errors/index.js";
import type { Command, CommandContext, CommandOutcome } from "./Command.js";

export async function dispatchCommand<TReply>(
  command: Command<TReply>,
  ctx: CommandContext,
): Promise<CommandOutcome<TReply>> {
  const started = Date.now();

  try {
    ctx.logger?.debug(`[CMD] ${command.type}`, { command });
    const outcome = await command.execute(ctx);
    ctx.logger?.info(`[CMD OK] ${command.type}`, {
      ms: Date.now() - started,
      events: outcome.events.length,
    });
    return outcome;
  } catch (error) {
    if (isExpectedError(error)) {
      ctx.logger?.warn(`[CMD REJECTED] ${command.type}`, {
        kind: error instanceof GameRuleError ? error.kind : undefined,
        message: error instanceof Error ? error.message : String(error),
      });
    } else {
      ctx.logger?.error(`[CMD ERR] ${command.type}`, { error });
    }
    throw error;
  }
}
