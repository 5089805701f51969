import { IProcessRunner, ProcessResult, ProcessRunOptions, formatCommand } from "./IProcessRunner";
import { PipelineInterruptedError } from "../errors";

export interface ProcessCall {
  command: string;
  args: string[];
  options?: ProcessRunOptions;
}

export type ProcessHandler = (call: ProcessCall) => ProcessResult | Promise<ProcessResult>;

const SUCCESS: ProcessResult = { stdout: "", stderr: "", exitCode: 0 };

/**
 * In-memory implementation of IProcessRunner for testing.
 * Responses are keyed by the full command line ("ollama pull llama3").
 * Queued responses are consumed in order; the last one repeats.
 * Unknown command lines succeed with empty output.
 */
export class InMemoryProcessRunner implements IProcessRunner {
  private calls: ProcessCall[] = [];
  private responses = new Map<string, ProcessResult[]>();
  private handlers = new Map<string, ProcessHandler>();

  async run(command: string, args: string[], options?: ProcessRunOptions): Promise<ProcessResult> {
    if (options?.signal?.aborted) {
      throw new PipelineInterruptedError();
    }

    const call: ProcessCall = { command, args, options };
    this.calls.push(call);

    const commandLine = formatCommand(command, args);
    const handler = this.handlers.get(commandLine);
    const result = handler ? await handler(call) : this.nextResponse(commandLine);

    if (result.stdout) {
      options?.onOutput?.(result.stdout);
    }
    if (result.stderr) {
      options?.onOutput?.(result.stderr);
    }
    return result;
  }

  /**
   * Mock the response(s) for a command line
   */
  mockResponse(commandLine: string, ...results: ProcessResult[]): void {
    this.responses.set(commandLine, [...results]);
  }

  /**
   * Compute the response for a command line on every call
   */
  mockHandler(commandLine: string, handler: ProcessHandler): void {
    this.handlers.set(commandLine, handler);
  }

  getCalls(): ProcessCall[] {
    return [...this.calls];
  }

  getCommandLines(): string[] {
    return this.calls.map((call) => formatCommand(call.command, call.args));
  }

  countCalls(commandLine: string): number {
    return this.getCommandLines().filter((line) => line === commandLine).length;
  }

  clear(): void {
    this.calls = [];
    this.responses.clear();
    this.handlers.clear();
  }

  private nextResponse(commandLine: string): ProcessResult {
    const queue = this.responses.get(commandLine);
    if (!queue || queue.length === 0) {
      return SUCCESS;
    }
    return queue.length > 1 ? queue.shift() ?? SUCCESS : queue[0];
  }
}
