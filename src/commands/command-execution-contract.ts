/**
 * Command Execution Contract
 *
 * Standardized lifecycle: parse -> validate -> execute -> render
 * for CLI command handlers. A stage signals failure by throwing; later
 * stages do not run.
 */

export interface RenderContext<TParsedArgs> {
  rawArgs: string[];
  parsedArgs: TParsedArgs;
}

export interface CommandExecutionContract<TParsedArgs, TExecutionResult> {
  parse(rawArgs: string[]): TParsedArgs;
  validate(parsedArgs: TParsedArgs): void;
  execute(parsedArgs: TParsedArgs): Promise<TExecutionResult> | TExecutionResult;
  render(
    result: TExecutionResult,
    context: RenderContext<TParsedArgs>
  ): Promise<void> | void;
}

export interface CommandRun<TParsedArgs, TExecutionResult> {
  parsedArgs: TParsedArgs;
  result: TExecutionResult;
}

/**
 * Run a command through the standard lifecycle.
 */
export async function runCommandWithContract<TParsedArgs, TExecutionResult>(
  rawArgs: string[],
  contract: CommandExecutionContract<TParsedArgs, TExecutionResult>
): Promise<CommandRun<TParsedArgs, TExecutionResult>> {
  const parsedArgs = contract.parse(rawArgs);
  contract.validate(parsedArgs);
  const result = await contract.execute(parsedArgs);
  await contract.render(result, { rawArgs, parsedArgs });
  return { parsedArgs, result };
}
