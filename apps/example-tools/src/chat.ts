import { action, observation, Tool } from "@armory/toolkit";
import { z } from "zod";

/** Keeps sent messages in memory. */
export class Chat extends Tool {
  private readonly sent: string[] = [];

  constructor() {
    super({
      capabilities: [
        action(Chat.prototype.sendMessage, {
          doc: "Send a chat message",
          parameters: { message: z.string().min(1) },
          returns: z.string(),
        }),
        observation(Chat.prototype.lastMessage, {
          doc: "Return the last message sent",
          returns: z.string().nullable(),
        }),
      ],
    });
  }

  sendMessage({ message }: { message: string }): string {
    this.sent.push(message);
    return "Message sent";
  }

  lastMessage(): string | null {
    return this.sent.length ? this.sent[this.sent.length - 1] : null;
  }
}
