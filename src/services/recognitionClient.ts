import axios, { AxiosInstance, AxiosResponse } from "axios";
import { getApiUrl, getRequestTimeoutMs, RECOGNITION_ENDPOINTS } from "../config/constants";
import { recognitionReplySchema, startStreamReplySchema } from "../schemas/recognitionSchemas";
import type { RecognitionResult, RecognitionTransport, StartStreamResult } from "../types/face";
import { getErrorMessage, TransportError } from "../utils/errors";

interface HttpRecognitionTransportOptions {
  /** Overrides API_URL from the environment */
  apiUrl?: string;
  http?: AxiosInstance;
}

const tryParseJson = (text: string): unknown => {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
};

const bodyText = (data: unknown): string => {
  if (typeof data === "string") return data;
  if (Buffer.isBuffer(data)) return data.toString("utf8");
  return data === undefined || data === null ? "" : JSON.stringify(data);
};

/**
 * Keep the body verbatim and attach the structured match when the body is one
 */
export const parseRecognitionReply = (text: string): RecognitionResult => {
  const parsed = recognitionReplySchema.safeParse(tryParseJson(text));
  return { text, match: parsed.success ? parsed.data : null };
};

/**
 * Client of the remote recognition backend
 */
export class HttpRecognitionTransport implements RecognitionTransport {
  private readonly http: AxiosInstance;

  constructor(private readonly options: HttpRecognitionTransportOptions = {}) {
    this.http = options.http ?? axios.create({ timeout: getRequestTimeoutMs() });
  }

  /**
   * POST /start_stream
   */
  async startStream(): Promise<StartStreamResult> {
    const text = await this.post(RECOGNITION_ENDPOINTS.START_STREAM);
    const parsed = startStreamReplySchema.safeParse(tryParseJson(text));
    if (!parsed.success) {
      throw new TransportError(`Unexpected ${RECOGNITION_ENDPOINTS.START_STREAM} reply: ${text}`, 200);
    }
    return parsed.data;
  }

  /**
   * POST /main with the raw image bytes
   */
  async recognize(bytes: Buffer): Promise<RecognitionResult> {
    const text = await this.post(RECOGNITION_ENDPOINTS.MAIN, bytes);
    return parseRecognitionReply(text);
  }

  private endpoint(path: string): string {
    const base = this.options.apiUrl?.replace(/\/+$/, "") ?? getApiUrl();
    return `${base}${path}`;
  }

  private async post(path: string, body?: Buffer): Promise<string> {
    const url = this.endpoint(path);

    let response: AxiosResponse<unknown>;
    try {
      response = await this.http.post<unknown>(url, body, {
        headers: body ? { "Content-Type": "application/octet-stream" } : undefined,
        responseType: "text",
        validateStatus: () => true,
      });
    } catch (err: unknown) {
      throw new TransportError(`Request to ${path} failed: ${getErrorMessage(err)}`);
    }

    if (response.status !== 200) {
      throw new TransportError(`Request to ${path} failed with status ${response.status}`, response.status);
    }

    return bodyText(response.data);
  }
}
