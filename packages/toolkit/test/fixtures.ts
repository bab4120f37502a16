import { z } from "zod";
import { action, observation, Tool } from "../src";

export class Calculator extends Tool {
  constructor() {
    super({
      capabilities: [
        action(Calculator.prototype.add, {
          doc: "Add two integers",
          parameters: { a: z.number().int(), b: z.number().int() },
          returns: z.number().int(),
        }),
      ],
    });
  }

  add({ a, b }: { a: number; b: number }): number {
    return a + b;
  }
}

/** Also exposes `add`, offset so results tell the two apart. */
export class Adder extends Tool {
  constructor() {
    super({
      capabilities: [
        action(Adder.prototype.add, {
          doc: "Add two integers plus one hundred",
          parameters: { a: z.number().int(), b: z.number().int() },
        }),
      ],
    });
  }

  add({ a, b }: { a: number; b: number }): number {
    return a + b + 100;
  }
}

export class WeatherTool extends Tool {
  constructor() {
    super({
      capabilities: [
        action(WeatherTool.prototype.getWeather, {
          doc: "Simulate getting the weather for a location.",
          parameters: { location: z.string() },
        }),
        observation(WeatherTool.prototype.currentTemperature, {
          doc: "Simulate getting the current temperature.",
        }),
      ],
    });
  }

  getWeather({ location }: { location: string }): string {
    return `Weather at ${location} is sunny.`;
  }

  currentTemperature(): string {
    return "Current temperature is 25°C.";
  }
}

export class ChatTool extends Tool {
  readonly sent: string[] = [];

  constructor() {
    super({
      capabilities: [
        action(ChatTool.prototype.sendMessage, {
          doc: "Simulate sending a chat message.",
          parameters: { message: z.string() },
        }),
        observation(ChatTool.prototype.lastMessage, {
          doc: "Return the last message sent.",
        }),
      ],
    });
  }

  sendMessage({ message }: { message: string }): string {
    this.sent.push(message);
    return "Message sent";
  }

  lastMessage(): string {
    return this.sent.length ? this.sent[this.sent.length - 1] : "";
  }
}

export class Counter extends Tool {
  count = 0;
  readonly state: { history: number[] } = { history: [] };
  released = 0;

  constructor() {
    super({
      description: "Counts things",
      capabilities: [
        action(Counter.prototype.increment, {
          doc: "Increase the counter",
          parameters: { by: z.number().int().default(1) },
        }),
        observation(Counter.prototype.current, { doc: "Current value" }),
        observation(Counter.prototype.snapshot, { doc: "History of values" }),
      ],
    });
  }

  increment({ by }: { by: number }): number {
    this.count += by;
    this.state.history.push(this.count);
    return this.count;
  }

  current(): number {
    return this.count;
  }

  snapshot(): { history: number[] } {
    return this.state;
  }

  protected release(): void {
    this.released += 1;
  }
}

export function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error("Expected the call to throw");
}
