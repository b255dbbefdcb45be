import { PassThrough } from "node:stream";
import { SMConsole, STEP_PROMPT } from "./SMConsole";

function flush(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

describe("SMConsole", () => {
  let input: PassThrough;
  let output: PassThrough;
  let written: string;
  let device: SMConsole;

  beforeEach(() => {
    input = new PassThrough();
    output = new PassThrough();
    written = "";
    output.on("data", (chunk: Buffer) => {
      written += chunk.toString();
    });
    device = new SMConsole(input, output);
  });

  afterEach(() => {
    device.close();
  });

  describe("print", () => {
    it("should write the value with an Output prefix", async () => {
      await device.print(8);
      await flush();
      expect(written).toBe("Output: 8\n");
    });
  });

  describe("writeLine", () => {
    it("should write the line as is", async () => {
      await device.writeLine("PEEK: Top item is 3");
      await flush();
      expect(written).toBe("PEEK: Top item is 3\n");
    });
  });

  describe("trace", () => {
    it("should write a formatted trace line", async () => {
      await device.trace({
        pc: 0,
        instruction: { opcode: "ADD", operand: null },
        stack: [5, 3],
        depth: 2,
      });
      await flush();
      expect(written).toBe(`PC:  0 ADD${" ".repeat(10)}Stack: [5, 3]\n`);
    });
  });

  describe("waitForStep", () => {
    it("should prompt and continue on Enter", async () => {
      const signal = device.waitForStep();
      await flush();
      input.write("\n");
      await expect(signal).resolves.toBe("continue");
      expect(written).toBe(STEP_PROMPT);
    });

    it("should interrupt when input ends", async () => {
      const signal = device.waitForStep();
      await flush();
      input.end();
      await expect(signal).resolves.toBe("interrupt");
      await flush();
      expect(written).toBe(`${STEP_PROMPT}\nExecution interrupted by user\n`);
    });

    it("should interrupt at once after close", async () => {
      device.close();
      await expect(device.waitForStep()).resolves.toBe("interrupt");
      expect(written).toBe("");
    });
  });
});
