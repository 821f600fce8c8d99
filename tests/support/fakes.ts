import type { LlmClient, LlmCompletionOptions } from "../../src/domain/ai/service";
import type { Messaging } from "../../src/adapters/chatwoot/client";
import type { NotificationQueue } from "../../src/domain/escalation/notifier";
import type { ExpertNotifier } from "../../src/domain/escalation/service";
import type { ExpertNotificationJobData } from "../../src/shared/types";

type Reply = string | Error | ((prompt: string, options: LlmCompletionOptions) => Promise<string>);

/** Answers each completion with the next scripted reply. */
export class ScriptedLlm implements LlmClient {
  prompts: string[] = [];

  constructor(private replies: Reply[]) {}

  async complete(prompt: string, options: LlmCompletionOptions = {}): Promise<string> {
    this.prompts.push(prompt);
    const reply = this.replies.shift();
    if (reply === undefined) throw new Error("No scripted reply left");
    if (reply instanceof Error) throw reply;
    if (typeof reply === "function") return reply(prompt, options);
    return reply;
  }
}

/** A completion that never settles unless its signal aborts. */
export function hangingReply(): Reply {
  return (_prompt, options) =>
    new Promise<string>((_resolve, reject) => {
      options.signal?.addEventListener("abort", () => reject(new Error("aborted")), { once: true });
    });
}

export class FakeMessaging implements Messaging {
  sent: Array<{ phone: string; text: string }> = [];
  failure: Error | null = null;

  async sendText(phone: string, text: string): Promise<void> {
    if (this.failure) throw this.failure;
    this.sent.push({ phone, text });
  }
}

export class FakeNotificationQueue implements NotificationQueue {
  added: Array<{ name: string; data: ExpertNotificationJobData; jobId: string | undefined }> = [];

  async add(name: string, data: ExpertNotificationJobData, opts?: { jobId?: string }): Promise<{ id?: string }> {
    this.added.push({ name, data, jobId: opts?.jobId });
    return { id: opts?.jobId ?? String(this.added.length) };
  }
}

export class RecordingNotifier implements ExpertNotifier {
  jobs: ExpertNotificationJobData[] = [];
  failure: Error | null = null;

  async notify(job: ExpertNotificationJobData): Promise<void> {
    if (this.failure) throw this.failure;
    this.jobs.push(job);
  }
}
