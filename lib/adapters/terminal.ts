import readline from "readline";
import type { ITerminal } from "../ports/ports";

/** stdin/stdout terminal; each ask() opens and closes its own readline interface. */
export class ReadlineTerminal implements ITerminal {
  constructor(
    private readonly input: NodeJS.ReadableStream = process.stdin,
    private readonly output: NodeJS.WritableStream = process.stdout,
  ) {}

  print(line: string): void {
    this.output.write(`${line}\n`);
  }

  ask(question: string): Promise<string> {
    return new Promise((res) => {
      const rl = readline.createInterface({ input: this.input, output: this.output });
      // stdin closed before a line arrived (EOF) reads as an empty answer
      let answered = false;
      rl.on("close", () => {
        if (!answered) res("");
      });
      rl.question(question, (answer) => {
        answered = true;
        rl.close();
        res(answer);
      });
    });
  }
}
