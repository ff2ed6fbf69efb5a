import { describe, expect, it } from "vitest";

import { resourceDefinitions } from "../../src/clients/fake/resources.js";
import {
  createResponseResolver,
  generateSid,
} from "../../src/clients/fake/responseResolver.js";

const fixedNow = new Date("2024-03-01T12:00:00Z");

const createResolver = () =>
  createResponseResolver({
    accountSid: "ACtest123",
    generateSid: (prefix) => `${prefix}test`,
    now: () => fixedNow,
  });

const messageData = {
  To: "+15551234567",
  From: "+15559876543",
  Body: "Hello",
};

describe("createResponseResolver", () => {
  it("synthesizes a message echoing the request", () => {
    const resolver = createResolver();

    const message = resolver.resolve(
      "messages.create",
      resourceDefinitions.messages,
      messageData
    );

    expect(message).toMatchObject({
      sid: "SMtest",
      accountSid: "ACtest123",
      to: "+15551234567",
      from: "+15559876543",
      body: "Hello",
      status: "sent",
      direction: "outbound-api",
      messagingServiceSid: null,
      numMedia: "0",
      errorCode: null,
      errorMessage: null,
      apiVersion: "2010-04-01",
      uri: "/2010-04-01/Accounts/ACtest123/Messages/SMtest.json",
      dateCreated: fixedNow,
    });
    expect(message.subresourceUris).toEqual({
      media: "/2010-04-01/Accounts/ACtest123/Messages/SMtest/Media.json",
      feedback: "/2010-04-01/Accounts/ACtest123/Messages/SMtest/Feedback.json",
    });
  });

  it("counts media attachments", () => {
    const resolver = createResolver();

    const message = resolver.resolve(
      "messages.create",
      resourceDefinitions.messages,
      {
        To: "+15551234567",
        MessagingServiceSid: "MG123",
        MediaUrl: ["https://example.com/a.png", "https://example.com/b.png"],
      }
    );

    expect(message.numMedia).toBe("2");
    expect(message.body).toBeNull();
    expect(message.messagingServiceSid).toBe("MG123");
  });

  it("synthesizes a queued call", () => {
    const resolver = createResolver();

    const call = resolver.resolve("calls.create", resourceDefinitions.calls, {
      To: "+15551234567",
      From: "+15559876543",
      Url: "https://example.com/twiml",
    });

    expect(call).toMatchObject({
      sid: "CAtest",
      status: "queued",
      to: "+15551234567",
      from: "+15559876543",
      uri: "/2010-04-01/Accounts/ACtest123/Calls/CAtest.json",
    });
  });

  it("merges a configured response over the default", () => {
    const resolver = createResolver();
    resolver.configure("messages.create", {
      status: "failed",
      errorCode: 21211,
    });

    const message = resolver.resolve(
      "messages.create",
      resourceDefinitions.messages,
      messageData
    );

    expect(message.status).toBe("failed");
    expect(message.errorCode).toBe(21211);
    expect(message.sid).toBe("SMtest");
    expect(message.to).toBe("+15551234567");
    expect(message.body).toBe("Hello");
    expect(message.errorMessage).toBeNull();
  });

  it("maps snake_case payload keys to response fields", () => {
    const resolver = createResolver();
    resolver.configure("messages.create", {
      error_code: 30007,
      error_message: "Message filtered",
      date_sent: null,
    });

    const message = resolver.resolve(
      "messages.create",
      resourceDefinitions.messages,
      messageData
    );

    expect(message.errorCode).toBe(30007);
    expect(message.errorMessage).toBe("Message filtered");
    expect(message.dateSent).toBeNull();
    expect("error_code" in message).toBe(false);
  });

  it("lets configured fields override echoed ones", () => {
    const resolver = createResolver();
    resolver.configure("messages.create", { body: "Custom response body" });

    const message = resolver.resolve(
      "messages.create",
      resourceDefinitions.messages,
      messageData
    );

    expect(message.body).toBe("Custom response body");
  });

  it("drops a configured response when cleared", () => {
    const resolver = createResolver();
    resolver.configure("messages.create", { status: "failed" });
    resolver.clear("messages.create");

    expect(
      resolver.resolve("messages.create", resourceDefinitions.messages, messageData)
        .status
    ).toBe("sent");
  });

  it("answers fetch from the fallback table with the requested sid", () => {
    const resolver = createResolver();

    const message = resolver.resolve(
      "messages.fetch",
      resourceDefinitions.messages,
      { Sid: "SMexisting" }
    );

    expect(message.sid).toBe("SMexisting");
    expect(message.status).toBe("delivered");
    expect(message.to).toBeNull();
  });

  it("echoes updated fields over the fallback", () => {
    const resolver = createResolver();

    const call = resolver.resolve("calls.update", resourceDefinitions.calls, {
      Sid: "CAexisting",
      Status: "canceled",
    });

    expect(call.sid).toBe("CAexisting");
    expect(call.status).toBe("canceled");
  });

  it("hands out queued failures once, in order", () => {
    const resolver = createResolver();
    resolver.queueFailure("messages.create", { code: 21211, message: "first" });
    resolver.queueFailure("messages.create", { code: 21610, message: "second" });

    expect(resolver.takeFailure("calls.create")).toBeUndefined();
    expect(resolver.takeFailure("messages.create")?.message).toBe("first");
    expect(resolver.takeFailure("messages.create")?.message).toBe("second");
    expect(resolver.takeFailure("messages.create")).toBeUndefined();
  });

  it("forgets configuration and failures on reset", () => {
    const resolver = createResolver();
    resolver.configure("messages.create", { status: "failed" });
    resolver.queueFailure("messages.create", { code: 21211, message: "x" });

    resolver.reset();

    expect(resolver.takeFailure("messages.create")).toBeUndefined();
    expect(
      resolver.resolve("messages.create", resourceDefinitions.messages, messageData)
        .status
    ).toBe("sent");
  });
});

describe("generateSid", () => {
  it("produces a prefix and 32 hex characters", () => {
    expect(generateSid("SM")).toMatch(/^SM[0-9a-f]{32}$/);
  });

  it("does not repeat identifiers", () => {
    const sids = new Set(Array.from({ length: 50 }, () => generateSid("SM")));
    expect(sids.size).toBe(50);
  });
});
