import { describe, expect, it, vi } from "vitest";
import { MemoryIdentityLinkStore } from "../adapters/memory-identity-store.js";
import { IdentityResolver } from "./identity-resolver.js";

describe("IdentityResolver", () => {
  it("uses the forward link when it targets the wanted platform", () => {
    const store = new MemoryIdentityLinkStore([
      {
        sourcePlatform: "twitch",
        sourceUserId: "U1",
        targetPlatform: "factorio",
        targetUserId: "Steve",
      },
    ]);
    const resolver = new IdentityResolver(store);

    expect(resolver.counterpart({ platform: "twitch", userId: "U1" }, "factorio")).toEqual({
      platform: "factorio",
      userId: "Steve",
    });
  });

  it("falls back to a unique reverse link", () => {
    const store = new MemoryIdentityLinkStore([
      {
        sourcePlatform: "twitch",
        sourceUserId: "U1",
        targetPlatform: "factorio",
        targetUserId: "Steve",
      },
    ]);
    const resolver = new IdentityResolver(store);

    expect(resolver.counterpart({ platform: "factorio", userId: "Steve" }, "twitch")).toEqual({
      platform: "twitch",
      userId: "U1",
    });
  });

  it("ignores a forward link that targets another platform", () => {
    const store = new MemoryIdentityLinkStore([
      {
        sourcePlatform: "twitch",
        sourceUserId: "U1",
        targetPlatform: "discord",
        targetUserId: "d1",
      },
    ]);
    const resolver = new IdentityResolver(store);

    expect(resolver.counterpart({ platform: "twitch", userId: "U1" }, "factorio")).toBeNull();
  });

  it("rejects ambiguous reverse matches and logs them", () => {
    const store = new MemoryIdentityLinkStore([
      {
        sourcePlatform: "twitch",
        sourceUserId: "U1",
        targetPlatform: "factorio",
        targetUserId: "Steve",
      },
      {
        sourcePlatform: "twitch",
        sourceUserId: "U2",
        targetPlatform: "factorio",
        targetUserId: "Steve",
      },
    ]);
    const logger = { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    const resolver = new IdentityResolver(store, logger);

    expect(resolver.counterpart({ platform: "factorio", userId: "Steve" }, "twitch")).toBeNull();
    expect(logger.info).toHaveBeenCalledWith("Ambiguous reverse identity link, not relaying", {
      component: "identity",
      user: "factorio:Steve",
      candidates: ["twitch:U1", "twitch:U2"],
    });
  });

  it("returns null when nothing is linked", () => {
    const resolver = new IdentityResolver(new MemoryIdentityLinkStore());
    expect(resolver.counterpart({ platform: "twitch", userId: "U9" }, "factorio")).toBeNull();
  });
});
