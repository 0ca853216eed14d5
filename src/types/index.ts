export type JsonPrimitive = null | boolean | number | string;

export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;

export interface JsonObject {
  [key: string]: JsonValue;
}

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

export type SignatureMode = 'prefixed' | 'payload' | 'strict';

export interface ApiResponse {
  status: number;
  ok: boolean;
  headers: Record<string, string>;
  body: string;
  data: JsonValue | undefined;
  fromCache: boolean;
  signature: string;
}
