import { createServer, type Server, type Socket } from "node:net";
import { afterEach, describe, expect, it } from "vitest";
import { encodePacket, PacketType, RconPacketDecoder } from "../core/rcon-codec.js";
import { ConsoleAuthRejectedError, ConsoleUnavailableError } from "../errors.js";
import { RconConnector } from "./rcon-connection.js";

const PASSWORD = "test-secret";

interface FakeConsole {
  server: Server;
  port: number;
  received: string[];
  sockets: Socket[];
}

/** Minimal in-process console: checks the password and echoes commands. */
async function startFakeConsole(): Promise<FakeConsole> {
  const received: string[] = [];
  const sockets: Socket[] = [];
  const server = createServer((socket) => {
    sockets.push(socket);
    const decoder = new RconPacketDecoder();
    socket.on("data", (chunk: Buffer) => {
      for (const packet of decoder.push(chunk)) {
        if (packet.type === PacketType.AUTH) {
          const ok = packet.body === PASSWORD;
          // Empty value packet ahead of the auth response, as real servers send.
          socket.write(encodePacket({ id: packet.id, type: PacketType.RESPONSE_VALUE, body: "" }));
          socket.write(
            encodePacket({ id: ok ? packet.id : -1, type: PacketType.AUTH_RESPONSE, body: "" }),
          );
        } else if (packet.body === "/hang") {
          received.push(packet.body);
        } else {
          received.push(packet.body);
          socket.write(
            encodePacket({
              id: packet.id,
              type: PacketType.RESPONSE_VALUE,
              body: `ran ${packet.body}`,
            }),
          );
        }
      }
    });
  });
  await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));
  const address = server.address();
  if (address === null || typeof address === "string") throw new Error("no TCP address");
  return { server, port: address.port, received, sockets };
}

function stopFakeConsole(fake: FakeConsole): Promise<void> {
  for (const socket of fake.sockets) socket.destroy();
  return new Promise((resolve) => fake.server.close(() => resolve()));
}

describe("RconConnector", () => {
  let fake: FakeConsole | undefined;

  afterEach(async () => {
    if (fake) await stopFakeConsole(fake);
    fake = undefined;
  });

  it("authenticates and correlates command responses", async () => {
    fake = await startFakeConsole();
    const connector = new RconConnector({ host: "127.0.0.1", port: fake.port, password: PASSWORD });
    expect(connector.target).toBe(`127.0.0.1:${fake.port}`);

    const connection = await connector.connect();
    await connection.authenticate();

    await expect(connection.exec("/time")).resolves.toBe("ran /time");
    await expect(connection.exec("give Steve 100")).resolves.toBe("ran give Steve 100");
    expect(fake.received).toEqual(["/time", "give Steve 100"]);

    connection.close();
    expect(connection.isOpen).toBe(false);
  });

  it("rejects a wrong password with ConsoleAuthRejectedError", async () => {
    fake = await startFakeConsole();
    const connection = await new RconConnector({
      host: "127.0.0.1",
      port: fake.port,
      password: "wrong",
    }).connect();

    await expect(connection.authenticate()).rejects.toBeInstanceOf(ConsoleAuthRejectedError);
    connection.close();
  });

  it("fails pending commands and notifies listeners when the server drops the socket", async () => {
    fake = await startFakeConsole();
    const connection = await new RconConnector({
      host: "127.0.0.1",
      port: fake.port,
      password: PASSWORD,
    }).connect();
    await connection.authenticate();

    const closed = new Promise<Error | undefined>((resolve) => connection.onClose(resolve));
    const pending = connection.exec("/hang");
    // Wait until the server has seen the command before dropping it.
    await expect.poll(() => fake?.received.length).toBe(1);
    for (const socket of fake.sockets) socket.destroy();

    await expect(pending).rejects.toBeInstanceOf(ConsoleUnavailableError);
    expect(await closed).toBeInstanceOf(ConsoleUnavailableError);
    expect(connection.isOpen).toBe(false);
    await expect(connection.exec("/time")).rejects.toBeInstanceOf(ConsoleUnavailableError);
  });

  it("reports an unreachable console as ConsoleUnavailableError", async () => {
    const closed = await startFakeConsole();
    const { port } = closed;
    await stopFakeConsole(closed);

    await expect(
      new RconConnector({ host: "127.0.0.1", port, password: PASSWORD }).connect(),
    ).rejects.toBeInstanceOf(ConsoleUnavailableError);
  });

  it("notifies close listeners without an error on a local close", async () => {
    fake = await startFakeConsole();
    const connection = await new RconConnector({
      host: "127.0.0.1",
      port: fake.port,
      password: PASSWORD,
    }).connect();
    const reasons: Array<Error | undefined> = [];
    connection.onClose((error) => reasons.push(error));

    connection.close();
    connection.close();

    expect(reasons).toEqual([undefined]);
  });
});
