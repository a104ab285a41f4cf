import axios, { InternalAxiosRequestConfig } from "axios";
import { ConfigurationError, TransportError } from "../../utils/errors";
import { HttpRecognitionTransport, parseRecognitionReply } from "../recognitionClient";

type Reply = { status: number; data: string } | Error;

/**
 * Axios instance answering from memory; records every request it sees
 */
const fakeBackend = (reply: Reply) => {
  const requests: InternalAxiosRequestConfig[] = [];
  const http = axios.create({
    adapter: async (config) => {
      requests.push(config);
      if (reply instanceof Error) throw reply;
      return { data: reply.data, status: reply.status, statusText: String(reply.status), headers: {}, config };
    },
  });
  return { http, requests };
};

describe("parseRecognitionReply", () => {
  it("keeps plain text verbatim without a match", () => {
    expect(parseRecognitionReply("Unknown person")).toEqual({ text: "Unknown person", match: null });
  });

  it("extracts a structured match", () => {
    const text = '{"name":"Alice","distance":0.42}';
    expect(parseRecognitionReply(text)).toEqual({ text, match: { name: "Alice", distance: 0.42 } });
  });

  it("ignores JSON that is not an object of the known shape", () => {
    expect(parseRecognitionReply("[1,2]").match).toBeNull();
    expect(parseRecognitionReply('{"name":7}').match).toBeNull();
  });

  it("needs at least one known field for a match", () => {
    expect(parseRecognitionReply("{}").match).toBeNull();
    expect(parseRecognitionReply('{"foo":1}').match).toBeNull();
    expect(parseRecognitionReply('{"message":"Unknown","foo":1}').match).toEqual({ message: "Unknown" });
  });
});

describe("HttpRecognitionTransport", () => {
  const originalEnv = process.env;

  beforeEach(() => {
    process.env = { ...originalEnv };
  });

  afterAll(() => {
    process.env = originalEnv;
  });

  describe("recognize", () => {
    it("posts raw bytes to /main as an octet stream", async () => {
      const { http, requests } = fakeBackend({ status: 200, data: "Alice" });
      const transport = new HttpRecognitionTransport({ apiUrl: "http://backend.test/", http });
      const bytes = Buffer.from([0xff, 0xd8, 0xff, 0x00]);

      const result = await transport.recognize(bytes);

      expect(result).toEqual({ text: "Alice", match: null });
      expect(requests).toHaveLength(1);
      expect(requests[0].method).toBe("post");
      expect(requests[0].url).toBe("http://backend.test/main");
      expect(requests[0].headers["Content-Type"]).toBe("application/octet-stream");
      expect(requests[0].data).toBe(bytes);
    });

    it("reads the base URL from API_URL", async () => {
      process.env.API_URL = "http://env-backend.test";
      const { http, requests } = fakeBackend({ status: 200, data: "Bob" });

      await new HttpRecognitionTransport({ http }).recognize(Buffer.from("x"));

      expect(requests[0].url).toBe("http://env-backend.test/main");
    });

    it("fails with ConfigurationError before any request when API_URL is missing", async () => {
      delete process.env.API_URL;
      const { http, requests } = fakeBackend({ status: 200, data: "Bob" });

      await expect(new HttpRecognitionTransport({ http }).recognize(Buffer.from("x"))).rejects.toBeInstanceOf(
        ConfigurationError
      );
      expect(requests).toHaveLength(0);
    });

    it("turns a non-200 status into TransportError", async () => {
      const { http, requests } = fakeBackend({ status: 500, data: "boom" });
      const transport = new HttpRecognitionTransport({ apiUrl: "http://backend.test", http });

      const error = await transport.recognize(Buffer.from("x")).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(TransportError);
      expect(error).toMatchObject({ message: "Request to /main failed with status 500", status: 500 });
      expect(requests).toHaveLength(1);
    });

    it("treats other 2xx statuses as failures", async () => {
      const { http } = fakeBackend({ status: 204, data: "" });
      const transport = new HttpRecognitionTransport({ apiUrl: "http://backend.test", http });

      await expect(transport.recognize(Buffer.from("x"))).rejects.toMatchObject({ status: 204 });
    });

    it("wraps network failures", async () => {
      const { http } = fakeBackend(new Error("socket hang up"));
      const transport = new HttpRecognitionTransport({ apiUrl: "http://backend.test", http });

      await expect(transport.recognize(Buffer.from("x"))).rejects.toThrow(
        new TransportError("Request to /main failed: socket hang up")
      );
    });
  });

  describe("startStream", () => {
    it("posts without a body and returns the message", async () => {
      const { http, requests } = fakeBackend({ status: 200, data: '{"message":"stream started"}' });
      const transport = new HttpRecognitionTransport({ apiUrl: "http://backend.test", http });

      await expect(transport.startStream()).resolves.toEqual({ message: "stream started" });
      expect(requests[0].url).toBe("http://backend.test/start_stream");
      expect(requests[0].data).toBeUndefined();
    });

    it("accepts a reply without a message", async () => {
      const { http } = fakeBackend({ status: 200, data: "{}" });
      const transport = new HttpRecognitionTransport({ apiUrl: "http://backend.test", http });

      await expect(transport.startStream()).resolves.toEqual({});
    });

    it("rejects a reply that is not JSON", async () => {
      const { http } = fakeBackend({ status: 200, data: "ok" });
      const transport = new HttpRecognitionTransport({ apiUrl: "http://backend.test", http });

      await expect(transport.startStream()).rejects.toBeInstanceOf(TransportError);
    });

    it("reports a non-200 status", async () => {
      const { http } = fakeBackend({ status: 503, data: "busy" });
      const transport = new HttpRecognitionTransport({ apiUrl: "http://backend.test", http });

      await expect(transport.startStream()).rejects.toMatchObject({
        message: "Request to /start_stream failed with status 503",
        status: 503,
      });
    });
  });
});
