// src/core/transport/types.ts

export type CellValue = string | number | boolean | null;
export type Row = CellValue[];

export type ParamValue = string | number | boolean;
export type RequestParams = Record<string, ParamValue>;

export interface PageResult {
  fieldNames: string[];
  rows: Row[];
  hasMore?: boolean; // false is authoritative: no further pages
}

export interface TransportRequest {
  endpoint: string;
  credential: string;
  params: RequestParams;
  fields: string[];
}

export interface TransportResponse {
  statusCode: number; // 0 on success
  message: string;
  data?: PageResult;
}

export interface Transport {
  send(request: TransportRequest, signal?: AbortSignal): Promise<TransportResponse>;
}

export interface HttpTransportConfig {
  baseUrl: string;
  timeoutMs?: number;
  keepAlive?: boolean;
}
