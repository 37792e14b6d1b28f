import test from "node:test";
import assert from "node:assert/strict";
import { DISCORD_CHUNK_SIZE, splitMessage, toDiscordEvent } from "../discord/connector.ts";

test("discord connector parses a channel message into event", () => {
  const event = toDiscordEvent({
    id: "555",
    channelId: "1000",
    content: "hello",
    createdTimestamp: 1730000000000,
    author: { id: "42", username: "alice", globalName: "Alice A.", bot: false },
  });

  assert.equal(event.channel, "discord");
  assert.equal(event.sender.id, "42");
  assert.equal(event.sender.display, "Alice A.");
  assert.equal(event.sender.username, "alice");
  assert.equal(event.sender.is_bot, false);
  assert.equal(event.conversation.thread_id, "1000");
  assert.equal(event.message.id, "555");
  assert.equal(event.message.text, "hello");
  assert.equal(event.received_at, "2024-10-27T03:33:20.000Z");
  assert.match(event.trace_id, /^[0-9a-f-]{36}$/);
});

test("discord connector falls back to the username without a global name", () => {
  const event = toDiscordEvent({
    id: "556",
    channelId: "1000",
    content: "beep",
    createdTimestamp: 1730000000000,
    author: { id: "77", username: "helper-bot", globalName: null, bot: true },
  });

  assert.equal(event.sender.display, "helper-bot");
  assert.equal(event.sender.is_bot, true);
});

test("splitMessage leaves short text alone", () => {
  assert.deepEqual(splitMessage("short", 10), ["short"]);
});

test("splitMessage prefers newline boundaries", () => {
  assert.deepEqual(splitMessage("aaaa\nbbbb\ncccc", 10), ["aaaa\nbbbb", "cccc"]);
});

test("splitMessage hard-cuts text without newlines", () => {
  assert.deepEqual(splitMessage("x".repeat(25), 10), ["x".repeat(10), "x".repeat(10), "x".repeat(5)]);
});

test("splitMessage keeps every chunk within the Discord limit", () => {
  const chunks = splitMessage("x".repeat(4000));

  assert.deepEqual(chunks.map((chunk) => chunk.length), [DISCORD_CHUNK_SIZE, DISCORD_CHUNK_SIZE, 20]);
  assert.equal(chunks.join(""), "x".repeat(4000));
});
