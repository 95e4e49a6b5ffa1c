import { CommandExecutor, CommandResult, CommandSpec } from "../src/types.js";

export type Responder = (executable: string, args: readonly string[]) => CommandResult;
export type StreamResponder = (executable: string, args: readonly string[]) => string[];

export function ok(stdout = ""): CommandResult {
  return { code: 0, stdout, stderr: "" };
}

export function failed(stderr = "", stdout = "", code = 1): CommandResult {
  return { code, stdout, stderr };
}

/** Records every command and answers from the given responders, without spawning anything. */
export class FakeRunner implements CommandExecutor {
  public calls: Array<{ executable: string; args: string[] }> = [];

  constructor(
    private readonly responder: Responder,
    private readonly streamResponder: StreamResponder = () => []
  ) {}

  async run(spec: CommandSpec): Promise<CommandResult> {
    this.calls.push({ executable: spec.executable, args: [...spec.args] });
    return this.responder(spec.executable, spec.args);
  }

  stream(spec: CommandSpec): AsyncIterable<string> {
    this.calls.push({ executable: spec.executable, args: [...spec.args] });
    const chunks = this.streamResponder(spec.executable, spec.args);
    return (async function* () {
      yield* chunks;
    })();
  }
}

export async function collect(stream: AsyncIterable<string>): Promise<string[]> {
  const chunks: string[] = [];
  for await (const chunk of stream) {
    chunks.push(chunk);
  }
  return chunks;
}
