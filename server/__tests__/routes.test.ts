import { describe, it, expect, vi } from "vitest";
import { createWebhookHandler, type UpdateSink } from "../routes";

function mockResponse() {
  const json = vi.fn();
  const status = vi.fn(() => ({ json }));
  const sendStatus = vi.fn();
  return { res: { status, sendStatus }, status, json, sendStatus };
}

describe("createWebhookHandler", () => {
  it("acknowledges the update before the bot has finished handling it", () => {
    let finish = () => {};
    const handleUpdate = vi.fn<UpdateSink["handleUpdate"]>(
      () =>
        new Promise<void>((resolve) => {
          finish = () => resolve();
        }),
    );
    const { res, sendStatus } = mockResponse();
    const body = { update_id: 7, message: { message_id: 1, text: "hello" } };

    createWebhookHandler({ handleUpdate })({ body }, res);

    expect(sendStatus).toHaveBeenCalledWith(200);
    expect(handleUpdate).toHaveBeenCalledWith(body);
    finish();
  });

  it("logs a failed update instead of answering with an error", async () => {
    const consoleSpy = vi.spyOn(console, "error").mockImplementation(() => {});
    const handleUpdate = vi.fn<UpdateSink["handleUpdate"]>(async () => {
      throw new Error("boom");
    });
    const { res, sendStatus, status } = mockResponse();

    createWebhookHandler({ handleUpdate })({ body: { update_id: 8 } }, res);

    expect(sendStatus).toHaveBeenCalledWith(200);
    await vi.waitFor(() => expect(consoleSpy).toHaveBeenCalled());
    expect(consoleSpy.mock.calls[0][0]).toBe("[Webhook update 8] boom");
    expect(status).not.toHaveBeenCalled();
  });

  it("rejects a body without an update id", () => {
    const handleUpdate = vi.fn<UpdateSink["handleUpdate"]>();
    const { res, status, json, sendStatus } = mockResponse();

    createWebhookHandler({ handleUpdate })({ body: { message: "hi" } }, res);

    expect(status).toHaveBeenCalledWith(400);
    expect(json).toHaveBeenCalledWith({ error: "Request body is not a Telegram update" });
    expect(sendStatus).not.toHaveBeenCalled();
    expect(handleUpdate).not.toHaveBeenCalled();
  });
});
