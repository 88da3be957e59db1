export type ChatType = "private" | "group" | "supergroup" | "channel";

export type InlineButton = { text: string; data: string };

/** Rows of inline buttons. */
export type Keyboard = InlineButton[][];

export type ChatEvent =
  | {
      kind: "message";
      chatId: string;
      chatType: ChatType;
      userId: string;
      messageId: string;
      text: string;
      timestampMs: number;
    }
  | {
      kind: "button";
      chatId: string;
      chatType: ChatType;
      userId: string;
      messageId: string;
      callbackId: string;
      data: string;
      timestampMs: number;
    };

export type SentMessage = { chatId: string; messageId: string; text: string };

/** What the conversation layer needs from a chat platform. */
export interface ChatTransport {
  sendText(chatId: string, text: string, keyboard?: Keyboard): Promise<SentMessage>;
  editText(chatId: string, messageId: string, text: string): Promise<void>;
  answerButton(callbackId: string): Promise<void>;
}
