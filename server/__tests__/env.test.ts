import { describe, it, expect } from "vitest";
import { isAuthorized, loadConfig } from "../config/env";

const required = { TELEGRAM_BOT_TOKEN: "test-token", GOOGLE_DRIVE_FOLDER_ID: "folder-1" };

describe("loadConfig", () => {
  it("applies defaults for optional settings", () => {
    const config = loadConfig({ ...required });
    expect(config).toMatchObject({
      telegramToken: "test-token",
      driveFolderId: "folder-1",
      webhookUrl: null,
      port: 8080,
      allowedUserIds: [],
      processAudioUrl: null,
      intelligenceUrl: null,
      chatUrl: null,
    });
  });

  it("parses the allow-list, port and URLs", () => {
    const config = loadConfig({
      ...required,
      PORT: "3000",
      ALLOWED_USER_IDS: "123, 456",
      WEBHOOK_URL: "https://bot.example.test/",
      INTELLIGENCE_URL: "http://intel.test//",
    });
    expect(config.port).toBe(3000);
    expect(config.allowedUserIds).toEqual([123, 456]);
    expect(config.webhookUrl).toBe("https://bot.example.test");
    expect(config.intelligenceUrl).toBe("http://intel.test");
  });

  it("treats empty optional values as unset", () => {
    const config = loadConfig({ ...required, WEBHOOK_URL: "", CHAT_URL: "" });
    expect(config.webhookUrl).toBeNull();
    expect(config.chatUrl).toBeNull();
  });

  it("fails when a required setting is missing", () => {
    expect(() => loadConfig({ GOOGLE_DRIVE_FOLDER_ID: "folder-1" })).toThrow(/^Invalid configuration: /);
  });

  it("fails on a malformed allow-list", () => {
    expect(() => loadConfig({ ...required, ALLOWED_USER_IDS: "123,abc" })).toThrow(/ALLOWED_USER_IDS/);
  });
});

describe("isAuthorized", () => {
  it("admits everyone when the list is empty", () => {
    expect(isAuthorized({ allowedUserIds: [] }, 1)).toBe(true);
  });

  it("admits only listed users otherwise", () => {
    expect(isAuthorized({ allowedUserIds: [1, 2] }, 2)).toBe(true);
    expect(isAuthorized({ allowedUserIds: [1, 2] }, 3)).toBe(false);
  });
});
