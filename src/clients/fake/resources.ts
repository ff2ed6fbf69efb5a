import type { ParamValue, WireParams, WireValue } from "./wireParams.js";

export type ResourceName = "messages" | "calls";

export type MethodName = "create" | "fetch" | "update";

export const resourceMethodTable = {
  "messages.create": { resource: "messages", method: "create" },
  "messages.fetch": { resource: "messages", method: "fetch" },
  "messages.update": { resource: "messages", method: "update" },
  "calls.create": { resource: "calls", method: "create" },
  "calls.fetch": { resource: "calls", method: "fetch" },
  "calls.update": { resource: "calls", method: "update" },
} as const satisfies Record<
  string,
  { resource: ResourceName; method: MethodName }
>;

export type ResourceMethodKey = keyof typeof resourceMethodTable;

export type ResourceOf<K extends ResourceMethodKey> =
  (typeof resourceMethodTable)[K]["resource"];

export function isResourceMethodKey(key: string): key is ResourceMethodKey {
  return Object.hasOwn(resourceMethodTable, key);
}

export function isResourceName(name: string): name is ResourceName {
  return name === "messages" || name === "calls";
}

export interface MessageResource {
  readonly sid: string;
  readonly accountSid: string;
  readonly to: string | null;
  readonly from: string | null;
  readonly body: string | null;
  readonly status: string;
  readonly direction: string;
  readonly messagingServiceSid: string | null;
  readonly numMedia: string;
  readonly numSegments: string;
  readonly price: string | null;
  readonly priceUnit: string;
  readonly errorCode: number | null;
  readonly errorMessage: string | null;
  readonly apiVersion: string;
  readonly uri: string;
  readonly dateCreated: Date;
  readonly dateUpdated: Date;
  readonly dateSent: Date | null;
  readonly subresourceUris: Readonly<Record<string, string>>;
}

export interface CallResource {
  readonly sid: string;
  readonly accountSid: string;
  readonly to: string | null;
  readonly from: string | null;
  readonly status: string;
  readonly direction: string;
  readonly applicationSid: string | null;
  readonly price: string | null;
  readonly priceUnit: string;
  readonly errorCode: number | null;
  readonly errorMessage: string | null;
  readonly apiVersion: string;
  readonly uri: string;
  readonly dateCreated: Date;
  readonly dateUpdated: Date;
}

export interface ResourceResponses {
  messages: MessageResource;
  calls: CallResource;
}

export type ResponseFor<K extends ResourceMethodKey> =
  ResourceResponses[ResourceOf<K>];

export type ConfiguredResponse<T> = Partial<T> & {
  readonly [field: string]: unknown;
};

export interface MessageCreateParams {
  to: string;
  from?: string;
  messagingServiceSid?: string;
  body?: string;
  mediaUrl?: string | string[];
  contentSid?: string;
  contentVariables?: string | Record<string, string>;
  statusCallback?: string;
  sendAt?: Date;
  scheduleType?: "fixed";
  [extension: string]: ParamValue;
}

export interface MessageUpdateParams {
  sid: string;
  body?: string;
  status?: "canceled";
  [extension: string]: ParamValue;
}

export interface CallCreateParams {
  to: string;
  from: string;
  url?: string;
  twiml?: string;
  applicationSid?: string;
  statusCallback?: string;
  record?: boolean;
  timeout?: number;
  [extension: string]: ParamValue;
}

export interface CallUpdateParams {
  sid: string;
  status?: "canceled" | "completed";
  url?: string;
  twiml?: string;
  [extension: string]: ParamValue;
}

export type FetchParams = {
  sid: string;
};

export const API_VERSION = "2010-04-01";

export interface SynthesisContext {
  sid: string;
  accountSid: string;
  now: Date;
}

export type Draft<T> = { -readonly [K in keyof T]?: T[K] };

export interface ResourceDefinition<T> {
  sidPrefix: string;
  synthesize(context: SynthesisContext): T;
  /**
   * Applied on top of the synthesized default for the partially supported
   * methods (`fetch`, `update`). The fake keeps no resource state between
   * calls, so these values are fixed per resource.
   */
  fallback: Draft<T>;
  /** Copies request fields onto the response. */
  echo(data: WireParams): Draft<T>;
}

function text(value: WireValue | undefined): string | undefined {
  return typeof value === "string" && value.length > 0 ? value : undefined;
}

function mediaCount(value: WireValue | undefined): string | undefined {
  if (Array.isArray(value)) {
    return String(value.length);
  }

  return text(value) === undefined ? undefined : "1";
}

export const resourceDefinitions: {
  readonly [R in ResourceName]: ResourceDefinition<ResourceResponses[R]>;
} = {
  messages: {
    sidPrefix: "SM",
    fallback: { status: "delivered" },
    synthesize: ({ sid, accountSid, now }) => {
      const base = `/${API_VERSION}/Accounts/${accountSid}/Messages/${sid}`;
      return {
        sid,
        accountSid,
        to: null,
        from: null,
        body: null,
        status: "sent",
        direction: "outbound-api",
        messagingServiceSid: null,
        numMedia: "0",
        numSegments: "1",
        price: "-0.0075",
        priceUnit: "USD",
        errorCode: null,
        errorMessage: null,
        apiVersion: API_VERSION,
        uri: `${base}.json`,
        dateCreated: now,
        dateUpdated: now,
        dateSent: now,
        subresourceUris: {
          media: `${base}/Media.json`,
          feedback: `${base}/Feedback.json`,
        },
      };
    },
    echo: (data) => {
      const echoed: Draft<MessageResource> = {};
      const to = text(data.To);
      const from = text(data.From);
      // An empty body is meaningful: updating to "" redacts the message.
      const body = typeof data.Body === "string" ? data.Body : undefined;
      const messagingServiceSid = text(data.MessagingServiceSid);
      const status = text(data.Status);
      const numMedia = mediaCount(data.MediaUrl);

      if (to !== undefined) echoed.to = to;
      if (from !== undefined) echoed.from = from;
      if (body !== undefined) echoed.body = body;
      if (messagingServiceSid !== undefined) {
        echoed.messagingServiceSid = messagingServiceSid;
      }
      if (status !== undefined) echoed.status = status;
      if (numMedia !== undefined) echoed.numMedia = numMedia;

      return echoed;
    },
  },
  calls: {
    sidPrefix: "CA",
    fallback: { status: "completed" },
    synthesize: ({ sid, accountSid, now }) => ({
      sid,
      accountSid,
      to: null,
      from: null,
      status: "queued",
      direction: "outbound-api",
      applicationSid: null,
      price: null,
      priceUnit: "USD",
      errorCode: null,
      errorMessage: null,
      apiVersion: API_VERSION,
      uri: `/${API_VERSION}/Accounts/${accountSid}/Calls/${sid}.json`,
      dateCreated: now,
      dateUpdated: now,
    }),
    echo: (data) => {
      const echoed: Draft<CallResource> = {};
      const to = text(data.To);
      const from = text(data.From);
      const applicationSid = text(data.ApplicationSid);
      const status = text(data.Status);

      if (to !== undefined) echoed.to = to;
      if (from !== undefined) echoed.from = from;
      if (applicationSid !== undefined) echoed.applicationSid = applicationSid;
      if (status !== undefined) echoed.status = status;

      return echoed;
    },
  },
};
