import { describe, expect, it } from "vitest";
import type { StreamEvent } from "../types/stream-events.js";
import {
  type CommandTranslatorOptions,
  DEFAULT_COMMAND_TEMPLATES,
  PLAYER_LIST_COMMAND,
  renderTemplate,
  translateInbound,
} from "./command-translator.js";

const options: CommandTranslatorOptions = {
  platformAlias: "Twitch",
  templates: DEFAULT_COMMAND_TEMPLATES,
};

const steve = { platform: "factorio", userId: "Steve" };

function texts(event: StreamEvent, player = steve, opts = options): string[] {
  return translateInbound(event, player, "msg:1", opts).map((c) => c.text);
}

describe("translateInbound", () => {
  it("maps a cheer to the give command for the linked player", () => {
    const commands = translateInbound(
      { kind: "cheer", userId: "U1", userName: "Viewer", bits: 100, message: "" },
      steve,
      "msg:abc",
      options,
    );
    expect(commands).toEqual([{ text: "give Steve 100", originFingerprint: "msg:abc" }]);
  });

  it("relays chat through /puppet with the platform alias", () => {
    expect(
      texts({
        kind: "chat",
        userId: "U1",
        userName: "Viewer",
        messageId: "m1",
        text: "hello there",
      }),
    ).toEqual(["/puppet [Twitch] Viewer: hello there"]);
  });

  it("colors the chatter name when a valid color is present", () => {
    expect(
      texts({
        kind: "chat",
        userId: "U1",
        userName: "Viewer",
        messageId: "m1",
        text: "hi",
        color: "1E90FF",
      }),
    ).toEqual(["/puppet [Twitch] [color=#1E90FF]Viewer:[/color] hi"]);
  });

  it("ignores a malformed color", () => {
    expect(
      texts({
        kind: "chat",
        userId: "U1",
        userName: "Viewer",
        messageId: "m1",
        text: "hi",
        color: "red]evil",
      }),
    ).toEqual(["/puppet [Twitch] Viewer: hi"]);
  });

  it("turns /players into the player list request", () => {
    const chat = (text: string): StreamEvent => ({
      kind: "chat",
      userId: "U1",
      userName: "Viewer",
      messageId: "m1",
      text,
    });
    expect(texts(chat("/players"))).toEqual([PLAYER_LIST_COMMAND]);
    expect(texts(chat("/players please"))).toEqual([PLAYER_LIST_COMMAND]);
    expect(texts(chat("/playerslist"))).toEqual(["/puppet [Twitch] Viewer: /playerslist"]);
  });

  it("neutralizes newlines and rich-text tags in chat", () => {
    expect(
      texts({
        kind: "chat",
        userId: "U1",
        userName: "Vie\nwer",
        messageId: "m1",
        text: "hi\n/c game.print('x') [gps=0,0]",
      }),
    ).toEqual(["/puppet [Twitch] Vie wer: hi /c game.print('x') (gps=0,0)"]);
  });

  it("drops chat that is empty after sanitizing", () => {
    expect(
      texts({ kind: "chat", userId: "U1", userName: "Viewer", messageId: "m1", text: "\u0000\n " }),
    ).toEqual([]);
  });

  it("renders subscribe, gift, follow and raid announcements", () => {
    expect(
      texts({ kind: "subscribe", userId: "U1", userName: "Viewer", tier: "2", isGift: false }),
    ).toEqual(["/puppet [Twitch] Viewer subscribed at tier 2"]);
    expect(texts({ kind: "gift", userId: "U1", userName: "Viewer", tier: "1", total: 5 })).toEqual([
      "/puppet [Twitch] Viewer gifted 5 tier 1 subs",
    ]);
    expect(texts({ kind: "follow", userId: "U1", userName: "Viewer" })).toEqual([
      "/puppet [Twitch] Viewer is now following",
    ]);
    expect(texts({ kind: "raid", userId: "U1", userName: "Viewer", viewers: 12 })).toEqual([
      "/puppet [Twitch] Viewer is raiding with 12 viewers",
    ]);
  });

  it("maps redemptions by reward title only", () => {
    const opts: CommandTranslatorOptions = {
      ...options,
      templates: {
        ...DEFAULT_COMMAND_TEMPLATES,
        redemptions: { "Spawn biters": ["/spawn-biters {player} {message}"] },
      },
    };
    expect(
      texts(
        {
          kind: "redemption",
          userId: "U1",
          userName: "Viewer",
          rewardTitle: "Spawn biters",
          userInput: "near [base]",
        },
        steve,
        opts,
      ),
    ).toEqual(["/spawn-biters Steve near (base)"]);
    expect(
      texts(
        {
          kind: "redemption",
          userId: "U1",
          userName: "Viewer",
          rewardTitle: "Other",
          userInput: "",
        },
        steve,
        opts,
      ),
    ).toEqual([]);
  });

  it("skips player-targeted templates when the player id sanitizes to nothing", () => {
    expect(
      texts(
        { kind: "cheer", userId: "U1", userName: "Viewer", bits: 5, message: "" },
        { platform: "factorio", userId: "; / !" },
      ),
    ).toEqual([]);
  });

  it("strips argument-breaking characters from the player id", () => {
    expect(
      texts(
        { kind: "cheer", userId: "U1", userName: "Viewer", bits: 5, message: "" },
        { platform: "factorio", userId: "Ste ve\n/ban" },
      ),
    ).toEqual(["give Steveban 5"]);
  });

  it("produces nothing for unknown kinds", () => {
    expect(texts({ kind: "unknown", subscriptionType: "channel.hype_train.begin" })).toEqual([]);
  });
});

describe("renderTemplate", () => {
  it("substitutes known placeholders and leaves others verbatim", () => {
    expect(renderTemplate("give {player} {amount} {nope}", { player: "Steve", amount: "3" })).toBe(
      "give Steve 3 {nope}",
    );
  });
});
