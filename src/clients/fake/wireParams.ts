export type ParamValue =
  | string
  | number
  | boolean
  | Date
  | null
  | undefined
  | readonly ParamValue[]
  | { readonly [field: string]: ParamValue };

export type CallerParams = { readonly [name: string]: ParamValue };

export type WireValue = string | number | null | readonly WireValue[];

export type WireParams = { readonly [wireName: string]: WireValue };

/**
 * Maps a caller-facing name to the provider's wire name. Accepts both
 * camelCase (`messagingServiceSid`) and snake_case (`messaging_service_sid`,
 * `from_`) spellings.
 */
export function toWireName(name: string): string {
  return name
    .split("_")
    .filter((part) => part.length > 0)
    .map((part) => part.charAt(0).toUpperCase() + part.slice(1))
    .join("");
}

export function toCallerName(wireName: string): string {
  return wireName.charAt(0).toLowerCase() + wireName.slice(1);
}

/** Caller name for a response field: `error_code` and `errorCode` both give `errorCode`. */
export function toFieldName(name: string): string {
  return toCallerName(toWireName(name));
}

export function serializeDateTime(value: Date): string {
  return value.toISOString().replace(/\.\d{3}Z$/, "Z");
}

function serializeValue(value: ParamValue): WireValue | undefined {
  if (value === undefined) {
    return undefined;
  }

  if (value === null || typeof value === "string" || typeof value === "number") {
    return value;
  }

  if (typeof value === "boolean") {
    return value ? "true" : "false";
  }

  if (value instanceof Date) {
    return serializeDateTime(value);
  }

  if (isParamList(value)) {
    return value
      .map(serializeValue)
      .filter((item): item is WireValue => item !== undefined);
  }

  return JSON.stringify(value);
}

function isParamList(value: ParamValue): value is readonly ParamValue[] {
  return Array.isArray(value);
}

function isWireList(value: WireValue): value is readonly WireValue[] {
  return Array.isArray(value);
}

function frozenParamValue(value: ParamValue): ParamValue {
  if (value instanceof Date) {
    return new Date(value.getTime());
  }

  if (isParamList(value)) {
    return Object.freeze(value.map(frozenParamValue));
  }

  if (value !== null && typeof value === "object") {
    return freezeCallerParams(value);
  }

  return value;
}

function frozenWireValue(value: WireValue): WireValue {
  return isWireList(value) ? Object.freeze(value.map(frozenWireValue)) : value;
}

/** Deep, frozen copy: later changes to the caller's arrays or maps do not reach it. */
export function freezeCallerParams(params: CallerParams): CallerParams {
  return Object.freeze(
    Object.fromEntries(
      Object.entries(params).map(([name, value]): [string, ParamValue] => [
        name,
        frozenParamValue(value),
      ])
    )
  );
}

export function freezeWireParams(data: WireParams): WireParams {
  return Object.freeze(
    Object.fromEntries(
      Object.entries(data).map(([name, value]): [string, WireValue] => [
        name,
        frozenWireValue(value),
      ])
    )
  );
}

export function toWireParams(params: CallerParams): WireParams {
  const data: Record<string, WireValue> = {};

  for (const [name, value] of Object.entries(params)) {
    const serialized = serializeValue(value);
    if (serialized !== undefined) {
      data[toWireName(name)] = serialized;
    }
  }

  return data;
}

export function isPresent(value: WireValue | undefined): boolean {
  if (value === undefined || value === null || value === "") {
    return false;
  }

  return !(Array.isArray(value) && value.length === 0);
}
