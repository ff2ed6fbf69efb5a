import { beforeEach, describe, expect, it, vi } from "vitest";

const { create, twilioFactory } = vi.hoisted(() => {
  const create = vi.fn();
  return {
    create,
    twilioFactory: vi.fn(() => ({ messages: { create } })),
  };
});

vi.mock("twilio", () => ({ default: twilioFactory }));

import { createTwilioClient } from "../../src/clients/twilio.js";

describe("createTwilioClient", () => {
  beforeEach(() => {
    create.mockReset();
    twilioFactory.mockClear();
  });

  it("builds the SDK client with the given credentials", () => {
    createTwilioClient("ACtest123", "test_token");

    expect(twilioFactory).toHaveBeenCalledWith("ACtest123", "test_token");
  });

  it("maps the created message to the fields the app uses", async () => {
    create.mockResolvedValue({
      sid: "SM123",
      status: "queued",
      errorCode: null,
      errorMessage: null,
      body: "Hello",
    });

    const client = createTwilioClient("ACtest123", "test_token");
    const message = await client.messages.create({
      to: "+15551234567",
      from: "+15559876543",
      body: "Hello",
    });

    expect(create).toHaveBeenCalledWith({
      to: "+15551234567",
      from: "+15559876543",
      body: "Hello",
    });
    expect(message).toEqual({
      sid: "SM123",
      status: "queued",
      errorCode: null,
      errorMessage: null,
    });
  });
});
