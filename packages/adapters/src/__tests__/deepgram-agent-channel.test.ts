import type { IncomingMessage } from "node:http";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import WebSocket, { WebSocketServer } from "ws";
import { DeepgramAgentChannel } from "../deepgram-agent-channel.js";
import { ChannelError } from "../errors.js";
import type { DisconnectInfo } from "../agent-channel.js";
import type { AgentServerEvent } from "../types.js";

interface Connection {
  socket: WebSocket;
  request: IncomingMessage;
}

function listen(server: WebSocketServer): Promise<string> {
  return new Promise((resolve) => {
    server.once("listening", () => {
      const address = server.address();
      resolve(typeof address === "string" ? address : `ws://127.0.0.1:${address.port}`);
    });
  });
}

function nextConnection(server: WebSocketServer): Promise<Connection> {
  return new Promise((resolve) => {
    server.once("connection", (socket, request) => resolve({ socket, request }));
  });
}

function nextMessage(socket: WebSocket): Promise<{ data: Buffer; isBinary: boolean }> {
  return new Promise((resolve) => {
    socket.once("message", (data, isBinary) => {
      resolve({ data: Buffer.isBuffer(data) ? data : Buffer.from(data.toString()), isBinary });
    });
  });
}

function nextEvent(channel: DeepgramAgentChannel): Promise<AgentServerEvent> {
  return new Promise((resolve) => channel.once("event", resolve));
}

describe("DeepgramAgentChannel", () => {
  let server: WebSocketServer;
  let url: string;
  let channel: DeepgramAgentChannel;

  beforeEach(async () => {
    server = new WebSocketServer({ port: 0, host: "127.0.0.1" });
    url = await listen(server);
    channel = new DeepgramAgentChannel({ url, apiKey: "test-secret", closeTimeoutMs: 500 });
  });

  afterEach(async () => {
    await channel.disconnect();
    for (const client of server.clients) client.terminate();
    await new Promise<void>((resolve) => server.close(() => resolve()));
  });

  it("authenticates with a Token header", async () => {
    const connection = nextConnection(server);
    await channel.connect();
    const { request } = await connection;

    expect(request.headers.authorization).toBe("Token test-secret");
    expect(channel.connected).toBe(true);
  });

  it("sends client messages as JSON text frames", async () => {
    const connection = nextConnection(server);
    await channel.connect();
    const { socket } = await connection;

    expect(channel.lastSentAt).toBeNull();
    const received = nextMessage(socket);
    channel.send({ type: "InjectUserMessage", content: "Hello" });

    const { data, isBinary } = await received;
    expect(isBinary).toBe(false);
    expect(JSON.parse(data.toString("utf-8"))).toEqual({ type: "InjectUserMessage", content: "Hello" });
    expect(channel.lastSentAt).not.toBeNull();
  });

  it("sends audio as binary frames", async () => {
    const connection = nextConnection(server);
    await channel.connect();
    const { socket } = await connection;

    const received = nextMessage(socket);
    channel.sendAudio(Buffer.from([1, 2, 3, 4]));

    const { data, isBinary } = await received;
    expect(isBinary).toBe(true);
    expect([...data]).toEqual([1, 2, 3, 4]);
  });

  it("emits parsed events for text frames and audio for binary frames", async () => {
    const connection = nextConnection(server);
    await channel.connect();
    const { socket } = await connection;

    const event = nextEvent(channel);
    socket.send(JSON.stringify({ type: "ConversationText", role: "assistant", content: "Hola" }));
    expect(await event).toEqual({ type: "ConversationText", role: "assistant", content: "Hola" });

    const audio = new Promise<Buffer>((resolve) => channel.once("audio", resolve));
    socket.send(Buffer.from([7, 8]), { binary: true });
    expect([...(await audio)]).toEqual([7, 8]);
  });

  it("reports malformed JSON as a channel error and keeps going", async () => {
    const connection = nextConnection(server);
    await channel.connect();
    const { socket } = await connection;

    const error = new Promise<Error>((resolve) => channel.once("error", resolve));
    socket.send("{ definitely not json");
    const err = await error;
    expect(err).toBeInstanceOf(ChannelError);
    expect(err.message).toContain("Unparsable agent message");

    const event = nextEvent(channel);
    socket.send(JSON.stringify({ type: "SettingsApplied" }));
    expect(await event).toEqual({ type: "SettingsApplied" });
  });

  it("emits disconnected when the server closes", async () => {
    const connection = nextConnection(server);
    await channel.connect();
    const { socket } = await connection;

    const disconnected = new Promise<DisconnectInfo>((resolve) => channel.once("disconnected", resolve));
    socket.close(1011, "agent crashed");

    expect(await disconnected).toEqual({ code: 1011, reason: "agent crashed" });
    expect(channel.connected).toBe(false);
    expect(() => channel.send({ type: "KeepAlive" })).toThrow(ChannelError);
  });

  it("closes cleanly on disconnect()", async () => {
    const connection = nextConnection(server);
    await channel.connect();
    const { socket } = await connection;

    const closed = new Promise<number>((resolve) => socket.once("close", (code) => resolve(code)));
    await channel.disconnect();

    expect(await closed).toBe(1000);
    expect(channel.connected).toBe(false);
  });

  it("rejects when the handshake is refused", async () => {
    const refusing = new WebSocketServer({
      port: 0,
      host: "127.0.0.1",
      verifyClient: (_info, done) => done(false, 401, "Unauthorized"),
    });
    const refusingUrl = await listen(refusing);
    const rejected = new DeepgramAgentChannel({ url: refusingUrl, apiKey: "wrong-secret" });

    try {
      await expect(rejected.connect()).rejects.toThrow("Voice agent rejected the connection (HTTP 401)");
      expect(rejected.connected).toBe(false);
    } finally {
      await new Promise<void>((resolve) => refusing.close(() => resolve()));
    }
  });

  it("rejects when nothing is listening", async () => {
    const offline = new DeepgramAgentChannel({ url: "ws://127.0.0.1:1", apiKey: "test-secret" });
    await expect(offline.connect()).rejects.toThrow(ChannelError);
  });
});
