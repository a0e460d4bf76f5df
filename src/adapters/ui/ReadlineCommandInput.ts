import { createInterface, type Interface } from "readline";
import type { CommandInterpreter } from "../../app/CommandInterpreter";

export interface ReadlineCommandInputOptions {
  input?: NodeJS.ReadableStream;
  onQuit: () => void;
  print?: (message: string) => void;
}

export class ReadlineCommandInput {
  private rl: Interface | null = null;

  constructor(
    private readonly interpreter: CommandInterpreter,
    private readonly options: ReadlineCommandInputOptions
  ) {}

  start(): void {
    if (this.rl) return;
    const rl = createInterface({ input: this.options.input ?? process.stdin, terminal: false });
    this.rl = rl;

    rl.on("line", (line) => this.handle(line));
    rl.on("close", () => {
      if (this.rl === rl) {
        this.rl = null;
        this.options.onQuit();
      }
    });
  }

  stop(): void {
    const rl = this.rl;
    if (!rl) return;
    this.rl = null;
    rl.close();
  }

  handle(line: string): void {
    const print = this.options.print ?? ((message: string) => console.log(message));
    const result = this.interpreter.execute(line);
    if (result.message) {
      if (result.kind === "error") console.warn(result.message);
      else print(result.message);
    }
    if (result.kind === "quit") {
      this.stop();
      this.options.onQuit();
    }
  }
}
