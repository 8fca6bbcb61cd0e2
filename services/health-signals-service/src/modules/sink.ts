import { OutboundMessage } from "./messages";

/**
 * Downstream collaborator for formatted messages.
 * `publish` resolves with the number of messages handed over.
 */
export interface RecordSink {
  readonly name: string;
  publish(topic: string, messages: OutboundMessage[]): Promise<number>;
  close(): Promise<void>;
}
