import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { DeliveryError } from "../errors.js";
import type { OutboundMessage } from "../types/relay.js";
import { HelixChatSender, type HelixChatSenderOptions } from "./helix-chat-sender.js";
import { LogChatSender } from "./log-chat-sender.js";

const OPTIONS: HelixChatSenderOptions = {
  clientId: "test-client",
  accessToken: "test-token",
  broadcasterId: "B1",
  botUserId: "BOT",
  retryDelayMs: 0,
};

function sentResponse(messageId = "m-1", isSent = true, dropReason: unknown = null): Response {
  return new Response(
    JSON.stringify({ data: [{ message_id: messageId, is_sent: isSent, drop_reason: dropReason }] }),
    { status: 200, headers: { "Content-Type": "application/json" } },
  );
}

function message(overrides: Partial<OutboundMessage> = {}): OutboundMessage {
  return { author: null, content: "[Factorio] Steve is on Nauvis", origin: 0, ...overrides };
}

function requestBody(fetchMock: ReturnType<typeof vi.fn>, call = 0): unknown {
  const init: RequestInit = fetchMock.mock.calls[call][1];
  return JSON.parse(String(init.body));
}

let fetchMock: ReturnType<typeof vi.fn>;

beforeEach(() => {
  fetchMock = vi.fn();
  vi.stubGlobal("fetch", fetchMock);
});

afterEach(() => {
  vi.unstubAllGlobals();
});

describe("HelixChatSender", () => {
  it("posts to /chat/messages as the bot when there is no author", async () => {
    fetchMock.mockResolvedValueOnce(sentResponse("m-1"));
    const sender = new HelixChatSender(OPTIONS);

    await expect(sender.send(message())).resolves.toEqual({ sent: true, messageId: "m-1" });

    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe("https://api.twitch.tv/helix/chat/messages");
    expect(init.method).toBe("POST");
    expect(init.headers).toEqual({
      "Content-Type": "application/json",
      Authorization: "Bearer test-token",
      "Client-Id": "test-client",
    });
    expect(requestBody(fetchMock)).toEqual({
      broadcaster_id: "B1",
      sender_id: "BOT",
      message: "[Factorio] Steve is on Nauvis",
    });
  });

  it("sends as the linked stream identity", async () => {
    fetchMock.mockResolvedValueOnce(sentResponse());
    const sender = new HelixChatSender(OPTIONS);

    await sender.send(
      message({ author: { platform: "twitch", userId: "U1" }, content: "[Factorio] Steve: hello" }),
    );

    expect(requestBody(fetchMock)).toMatchObject({ sender_id: "U1" });
  });

  it("aborts the request when the caller's signal fires", async () => {
    fetchMock.mockImplementationOnce(
      (_url: string, init: RequestInit) =>
        new Promise((_resolve, reject) => {
          init.signal?.addEventListener("abort", () => reject(new Error("aborted")));
        }),
    );
    const controller = new AbortController();
    const sending = new HelixChatSender(OPTIONS).send(message(), controller.signal);

    controller.abort();

    await expect(sending).rejects.toBeInstanceOf(DeliveryError);
    await expect(sending).rejects.toThrow("Helix POST /chat/messages failed: aborted");
    expect(fetchMock.mock.calls[0][1].signal).toBe(controller.signal);
  });

  it("retries once after a 429", async () => {
    fetchMock
      .mockResolvedValueOnce(new Response("slow down", { status: 429 }))
      .mockResolvedValueOnce(sentResponse("m-2"));
    const sender = new HelixChatSender(OPTIONS);

    await expect(sender.send(message())).resolves.toEqual({ sent: true, messageId: "m-2" });
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it("gives up after a second 429", async () => {
    fetchMock
      .mockResolvedValueOnce(new Response("slow down", { status: 429 }))
      .mockResolvedValueOnce(new Response("slow down", { status: 429 }));
    const sender = new HelixChatSender(OPTIONS);

    await expect(sender.send(message())).rejects.toThrow(
      "Helix POST /chat/messages failed: 429 slow down",
    );
  });

  it("reports a message the platform dropped", async () => {
    fetchMock.mockResolvedValueOnce(
      sentResponse("m-3", false, { code: "msg_duplicate", message: "duplicate message" }),
    );
    const warn = vi.fn();
    const sender = new HelixChatSender({
      ...OPTIONS,
      logger: { info: vi.fn(), warn, error: vi.fn() },
    });

    await expect(sender.send(message())).resolves.toEqual({
      sent: false,
      messageId: "m-3",
      dropReason: "msg_duplicate: duplicate message",
    });
    expect(warn).toHaveBeenCalledOnce();
  });

  it("wraps network failures and unexpected bodies in DeliveryError", async () => {
    fetchMock.mockRejectedValueOnce(new Error("ECONNRESET"));
    const sender = new HelixChatSender(OPTIONS);
    await expect(sender.send(message())).rejects.toBeInstanceOf(DeliveryError);

    fetchMock.mockResolvedValueOnce(new Response(JSON.stringify({ data: [] }), { status: 200 }));
    await expect(sender.send(message())).rejects.toThrow("returned an unexpected body");
  });

  it("honours a custom base URL", async () => {
    fetchMock.mockResolvedValueOnce(sentResponse());
    const sender = new HelixChatSender({ ...OPTIONS, baseUrl: "http://127.0.0.1:9/helix/" });
    await sender.send(message());
    expect(fetchMock.mock.calls[0][0]).toBe("http://127.0.0.1:9/helix/chat/messages");
  });
});

describe("LogChatSender", () => {
  it("logs the message and reports it as sent", async () => {
    const info = vi.fn();
    const sender = new LogChatSender({ info, warn: vi.fn(), error: vi.fn() });

    await expect(
      sender.send(message({ author: { platform: "twitch", userId: "U1" }, content: "hi" })),
    ).resolves.toEqual({ sent: true });
    expect(info).toHaveBeenCalledWith("Outbound chat message (not sent, no chat credentials)", {
      component: "relay",
      author: "twitch:U1",
      content: "hi",
    });
  });
});
