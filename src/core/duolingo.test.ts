import test from "node:test";
import assert from "node:assert/strict";
import { WebhookNotifier } from "../reminders/webhook.js";
import type { ChatEvent, ChatTransport, Keyboard, SentMessage } from "../types.js";
import { DuolingoHandler, DuolingoMessages, FRIEND_MESSAGES, pickFriendMessage } from "./duolingo.js";

type FetchArgs = [input: string | URL | Request, init?: RequestInit];

class FakeTransport implements ChatTransport {
  readonly sent: { chatId: string; text: string; keyboard?: Keyboard }[] = [];
  readonly edits: { chatId: string; messageId: string; text: string }[] = [];
  readonly answered: string[] = [];

  async sendText(chatId: string, text: string, keyboard?: Keyboard): Promise<SentMessage> {
    this.sent.push({ chatId, text, keyboard });
    return { chatId, messageId: String(this.sent.length), text };
  }

  async editText(chatId: string, messageId: string, text: string): Promise<void> {
    this.edits.push({ chatId, messageId, text });
  }

  async answerButton(callbackId: string): Promise<void> {
    this.answered.push(callbackId);
  }
}

function text(value: string): ChatEvent {
  return { kind: "message", chatId: "c1", chatType: "private", userId: "u1", messageId: "in", text: value, timestampMs: 0 };
}

function press(data: string): ChatEvent {
  return { kind: "button", chatId: "c1", chatType: "private", userId: "u1", messageId: "7", callbackId: "cb1", data, timestampMs: 0 };
}

function setup(url: string | undefined = "http://hooks.test/duo") {
  const transport = new FakeTransport();
  const handler = new DuolingoHandler({ transport, notifier: new WebhookNotifier(url), random: () => 0 });
  return { transport, handler };
}

test("pickFriendMessage: maps [0, 1) onto the list", () => {
  assert.equal(FRIEND_MESSAGES.length, 10);
  assert.equal(pickFriendMessage(() => 0), FRIEND_MESSAGES[0]);
  assert.equal(pickFriendMessage(() => 0.55), FRIEND_MESSAGES[5]);
  assert.equal(pickFriendMessage(() => 0.999), FRIEND_MESSAGES[9]);
});

test("DuolingoHandler: /duolingo shows the notify button", async () => {
  const { transport, handler } = setup();
  assert.equal(await handler.handle(text("/duolingo@LastWarBot")), true);
  assert.deepEqual(transport.sent, [
    { chatId: "c1", text: DuolingoMessages.WELCOME, keyboard: [[{ text: "Notify Friends", data: "duo:notify" }]] }
  ]);
});

test("DuolingoHandler: notify posts a friend message and reports success", async (t) => {
  const fetchMock = t.mock.method(globalThis, "fetch", async (..._args: FetchArgs) => new Response(null, { status: 204 }));
  const { transport, handler } = setup();

  assert.equal(await handler.handle(press("duo:notify")), true);
  assert.deepEqual(transport.answered, ["cb1"]);
  assert.deepEqual(transport.edits, [{ chatId: "c1", messageId: "7", text: DuolingoMessages.NOTIFYING }]);

  const [input, init] = fetchMock.mock.calls[0].arguments;
  assert.equal(String(input), "http://hooks.test/duo");
  assert.deepEqual(JSON.parse(String(init?.body)), { message: FRIEND_MESSAGES[0] });
  assert.deepEqual(transport.sent, [{ chatId: "c1", text: DuolingoMessages.SUCCESS, keyboard: undefined }]);
});

test("DuolingoHandler: webhook failure or no webhook reports failure", async (t) => {
  t.mock.method(globalThis, "fetch", async (..._args: FetchArgs) => new Response("down", { status: 502 }));
  const failing = setup();
  await failing.handler.handle(press("duo:notify"));
  assert.equal(failing.transport.sent[0].text, DuolingoMessages.FAILED);

  const unset = setup(undefined);
  await unset.handler.handle(press("duo:notify"));
  assert.equal(unset.transport.sent[0].text, DuolingoMessages.FAILED);
});

test("DuolingoHandler: leaves other commands and buttons alone", async () => {
  const { transport, handler } = setup();
  assert.equal(await handler.handle(text("/lw")), false);
  assert.equal(await handler.handle(text("duolingo")), false);
  assert.equal(await handler.handle(press("lw:truck")), false);
  assert.deepEqual(transport.answered, []);
  assert.deepEqual(transport.sent, []);
});

test("DuolingoHandler: unknown duo buttons are answered and ignored", async () => {
  const { transport, handler } = setup();
  assert.equal(await handler.handle(press("duo:other")), true);
  assert.deepEqual(transport.answered, ["cb1"]);
  assert.deepEqual(transport.edits, []);
});
