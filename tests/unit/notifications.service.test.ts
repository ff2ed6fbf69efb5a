import { describe, expect, it, vi } from "vitest";

import {
  createNotificationService,
  formatOrderMessage,
} from "../../src/services/notifications.js";
import { createFakeTwilioClient } from "../../src/clients/twilio.fake.js";
import type { MessagingClient } from "../../src/types/index.js";

const fromNumber = "+15559876543";

const createTestService = () => {
  const client = createFakeTwilioClient({
    generateSid: (prefix) => `${prefix}fixture`,
  });
  const service = createNotificationService({ client, fromNumber });
  return { client, service };
};

describe("createNotificationService", () => {
  it("sends a welcome message", async () => {
    const { client, service } = createTestService();

    const result = await service.sendWelcomeMessage("+15551234567", "Alice");

    expect(result).toEqual({ success: true, messageSid: "SMfixture" });
    client.assertCalledWith("messages.create", {
      To: "+15551234567",
      From: fromNumber,
      Body: "Welcome to our service, Alice! Thanks for signing up.",
    });
  });

  it.each([
    ["confirmed", "Your order #12345 has been confirmed!"],
    ["shipped", "Your order #12345 has shipped and is on its way!"],
    ["delivered", "Your order #12345 has been delivered. Enjoy!"],
    ["processing", "Order #12345 status: processing"],
  ])("sends the %s order notification", async (status, body) => {
    const { client, service } = createTestService();

    const result = await service.sendOrderNotification(
      "+15551234567",
      "12345",
      status
    );

    expect(result.success).toBe(true);
    client.assertCalledWith("messages.create", { Body: body });
  });

  it("prefers the messaging service SID over the from number", async () => {
    const client = createFakeTwilioClient();
    const service = createNotificationService({
      client,
      fromNumber,
      messagingServiceSid: "MG123",
    });

    await service.sendWelcomeMessage("+15551234567", "Bob");

    expect(client.getLastCall()?.data).toEqual({
      To: "+15551234567",
      Body: "Welcome to our service, Bob! Thanks for signing up.",
      MessagingServiceSid: "MG123",
    });
  });

  it("reports a failure when the client rejects the request", async () => {
    const client = createFakeTwilioClient();
    const service = createNotificationService({ client });

    const result = await service.sendWelcomeMessage("+15551234567", "Carol");

    expect(result).toEqual({
      success: false,
      error:
        "messages.create is missing sender identity: provide one of from, messagingServiceSid",
    });
    expect(client.getCalls()).toHaveLength(0);
  });

  it("reports API errors returned by the provider", async () => {
    const { client, service } = createTestService();
    client.failNext("messages.create", {
      code: 21211,
      message: "The 'To' number invalid-phone is not a valid phone number.",
    });

    const result = await service.sendWelcomeMessage("invalid-phone", "Dan");

    expect(result).toEqual({
      success: false,
      error: "The 'To' number invalid-phone is not a valid phone number.",
    });
    expect(client.getCalls()).toHaveLength(1);
  });

  it("sends announcements to every recipient in order", async () => {
    const { client, service } = createTestService();
    const phones = ["+15551111111", "+15552222222", "+15553333333"];

    const results = await service.sendBulkAnnouncement(
      phones,
      "Special offer: 50% off all items this weekend!"
    );

    expect(results.map((result) => result.success)).toEqual([true, true, true]);
    expect(client.getCalls().map((call) => call.data.To)).toEqual(phones);
    expect(
      client
        .getCalls()
        .every(
          (call) =>
            call.data.From === fromNumber &&
            call.data.Body === "Special offer: 50% off all items this weekend!"
        )
    ).toBe(true);
  });

  it("isolates a failing recipient from the rest", async () => {
    const { client, service } = createTestService();

    const results = await service.sendBulkAnnouncement(
      ["+15551111111", "", "+15553333333"],
      "Test announcement"
    );

    expect(results).toEqual([
      { phone: "+15551111111", success: true, messageSid: "SMfixture" },
      {
        phone: "",
        success: false,
        error: "Missing required argument 'to' (To) for messages.create",
      },
      { phone: "+15553333333", success: true, messageSid: "SMfixture" },
    ]);
    expect(client.getCalls()).toHaveLength(2);
  });

  it("works with any promise-returning messaging client", async () => {
    const create = vi.fn(async () => ({ sid: "SM123", status: "queued" }));
    const client: MessagingClient = { messages: { create } };
    const service = createNotificationService({ client, fromNumber });

    const result = await service.sendWelcomeMessage("+15551234567", "Eve");

    expect(create).toHaveBeenCalledWith({
      to: "+15551234567",
      body: "Welcome to our service, Eve! Thanks for signing up.",
      from: fromNumber,
    });
    expect(result).toEqual({ success: true, messageSid: "SM123" });
  });
});

describe("formatOrderMessage", () => {
  it("falls back to a generic status line", () => {
    expect(formatOrderMessage("7", "returned")).toBe("Order #7 status: returned");
  });
});
