/**
 * Proxy engine boundary shapes.
 *
 * The engine hands these in per occurrence and gets an EngineAction back.
 */

/** Header values as the engine reports them; repeated headers arrive as arrays */
export type EngineHeaders = Record<string, string | string[] | undefined>;

export interface EngineRequest {
  method: string;
  scheme: 'http' | 'https' | 'ws' | 'wss';
  host: string;
  port: number;
  /** Path including the query string */
  path: string;
  headers?: EngineHeaders;
  body?: string;
}

export interface EngineResponse {
  statusCode: number;
  headers?: EngineHeaders;
  body?: string;
}

export interface EngineConnection {
  address?: { ip: string; port: number };
  /** SNI presented during the TLS handshake */
  sni?: string;
}

export interface EngineFlow {
  id: string;
  request?: EngineRequest;
  response?: EngineResponse;
  client?: EngineConnection;
  server?: EngineConnection;
}

export interface EngineWebSocketMessage {
  fromClient: boolean;
  content: string;
}

export type EngineHeaderChange = { type: 'set'; name: string; value: string } | { type: 'remove'; name: string };

export type EngineAction =
  | { type: 'continue' }
  | { type: 'modify'; headers: EngineHeaderChange[]; body?: string }
  | { type: 'block'; statusCode: number; reason: string }
  | { type: 'respond'; statusCode: number; headers: Record<string, string>; body: string };
