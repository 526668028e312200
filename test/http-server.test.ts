import path from "node:path";
import request from "supertest";
import { afterEach, describe, expect, it } from "vitest";
import { ProxyServiceFactory } from "../src/factory/proxyServiceFactory";
import type { ServeConfig } from "../src/schemas/config-schema";
import type { HttpServer } from "../src/server/httpServer";
import { CertificateManager } from "../src/ssl/certificateManager";
import { captureLogger, FixedRandom, silentLogger, testConfig } from "./helpers/fakes";
import { startUpstream, unusedPort, type Upstream } from "./helpers/upstream";

const cleanup: Array<() => Promise<void>> = [];

afterEach(async () => {
  while (cleanup.length > 0) {
    const step = cleanup.pop();
    if (step) await step();
  }
});

function createNode(overrides: Partial<ServeConfig> = {}, random = new FixedRandom(0)): HttpServer {
  const server = ProxyServiceFactory.createServer(testConfig(overrides), silentLogger(), undefined, {
    random,
    host: "127.0.0.1",
  });
  cleanup.push(() => server.stop());
  return server;
}

async function startNode(serviceName: string): Promise<string> {
  const server = createNode({ serviceName });
  await server.start();
  return `127.0.0.1:${server.port}`;
}

async function startTlsNode(serviceName: string): Promise<string> {
  const tls = await new CertificateManager().loadCertificate(
    path.join(__dirname, "fixtures", "node-cert.pem"),
    path.join(__dirname, "fixtures", "node-key.pem")
  );
  const server = ProxyServiceFactory.createServer(testConfig({ serviceName }), silentLogger(), tls, {
    random: new FixedRandom(0),
    host: "127.0.0.1",
  });
  cleanup.push(() => server.stop());
  await server.start();
  return `127.0.0.1:${server.port}`;
}

async function upstreamFor(opts: { hold?: boolean } = {}): Promise<Upstream> {
  const upstream = await startUpstream(opts);
  cleanup.push(() => upstream.close());
  return upstream;
}

describe("HttpServer", () => {
  describe("local responses", () => {
    it("answers health checks", async () => {
      const res = await request(createNode().app).get("/health");

      expect(res.status).toBe(200);
      expect(res.body).toEqual({ status: "healthy", service: "svc-a" });
    });

    it("answers the final hop with the success envelope", async () => {
      const res = await request(createNode().app).get("/");

      expect(res.status).toBe(200);
      expect(res.headers["content-type"]).toBe("application/json");
      expect(res.text).toBe('{"status":200,"service":"svc-a","message":"Request processed successfully"}\n');
    });

    it("injects a fault", async () => {
      const res = await request(createNode().app).get("/fault/503");

      expect(res.status).toBe(503);
      expect(res.body).toEqual({ status: 503, service: "svc-a", message: "Fault injected: 503 Service Unavailable" });
    });

    it.each([
      ["/proxy/", "invalid path: empty service name\n"],
      ["/api/abcdef", "invalid path: must start with /proxy/ or /fault/\n"],
      ["/fault/700", "invalid fault code: must be 400-599\n"],
      ["/fault/500/150", "invalid fault percentage: must be 0-100\n"],
    ])("rejects %s with a 400", async (route, text) => {
      const res = await request(createNode().app).get(route);

      expect(res.status).toBe(400);
      expect(res.headers["content-type"]).toBe("text/plain; charset=utf-8");
      expect(res.text).toBe(text);
    });

    it.each(["/health/", "/HEALTH"])("reads %s as a path, not a health check", async (route) => {
      const res = await request(createNode().app).get(route);

      expect(res.status).toBe(400);
      expect(res.text).toBe("invalid path: must start with /proxy/ or /fault/\n");
    });

    it("rejects a malformed percent-encoding with a 400", async () => {
      const res = await request(createNode().app).get("/proxy/b%ZZ");

      expect(res.status).toBe(400);
      expect(res.text).toBe("invalid path: malformed percent-encoding\n");
    });

    it("echoes the caller's request id", async () => {
      const res = await request(createNode().app).get("/").set("x-request-id", "req-123");

      expect(res.headers["x-request-id"]).toBe("req-123");
    });

    it("mints a request id when none is sent", async () => {
      const res = await request(createNode().app).get("/");

      expect(res.headers["x-request-id"]).toMatch(/^[0-9a-f-]{36}$/);
    });
  });

  describe("chains", () => {
    it("relays the answer of the last service", async () => {
      const b = await startNode("svc-b");
      const c = await startNode("svc-c");

      const res = await request(createNode().app).get(`/proxy/${b}/proxy/${c}`);

      expect(res.status).toBe(200);
      expect(res.body).toEqual({ status: 200, service: "svc-c", message: "Request processed successfully" });
    });

    it("decodes an encoded port separator before forwarding", async () => {
      const b = await startNode("svc-b");

      const res = await request(createNode().app).get(`/proxy/${b.replace(":", "%3A")}`);

      expect(res.status).toBe(200);
      expect(res.body.service).toBe("svc-b");
    });

    it("relays a fault injected downstream unchanged", async () => {
      const b = await startNode("svc-b");

      const res = await request(createNode().app).get(`/proxy/${b}/fault/503`);

      expect(res.status).toBe(503);
      expect(res.body).toEqual({ status: 503, service: "svc-b", message: "Fault injected: 503 Service Unavailable" });
    });

    it("does not reach the next hop when a local fault fires", async () => {
      const upstream = await upstreamFor();

      const res = await request(createNode().app).get(`/fault/500/100/proxy/127.0.0.1:${upstream.port}`);

      expect(res.status).toBe(500);
      expect(res.body.service).toBe("svc-a");
      expect(upstream.requests).toHaveLength(0);
    });

    it("forwards method, body and request id but not the query string", async () => {
      const upstream = await upstreamFor();

      const res = await request(createNode().app)
        .post(`/proxy/127.0.0.1:${upstream.port}/echo?debug=1`)
        .set("content-type", "text/plain")
        .set("x-request-id", "req-42")
        .send("hello");

      expect(res.status).toBe(200);
      expect(res.headers["x-upstream"]).toBe("echo");
      expect(res.headers["x-request-id"]).toBe("req-42");
      expect(res.body).toEqual({ method: "POST", url: "/echo", body: "hello" });
      expect(upstream.requests[0].headers["x-request-id"]).toBe("req-42");
    });

    it("answers 502 when the next hop is unreachable", async () => {
      const port = await unusedPort();

      const res = await request(createNode().app).get(`/proxy/127.0.0.1:${port}`);

      expect(res.status).toBe(502);
      expect(res.text.startsWith(`Next hop error: Upstream http://127.0.0.1:${port}/ failed: `)).toBe(true);
    });

    it("answers 502 when the next hop outlives the timeout", async () => {
      const upstream = await upstreamFor({ hold: true });

      const res = await request(createNode({ timeoutMs: 200 }).app).get(`/proxy/127.0.0.1:${upstream.port}/slow`);

      expect(res.status).toBe(502);
      expect(res.text.startsWith(`Next hop error: Upstream http://127.0.0.1:${upstream.port}/slow failed: `)).toBe(true);
    });
  });

  describe("https next hops", () => {
    it("relays through a self-signed hop when verification is off", async () => {
      const b = await startTlsNode("svc-b");

      const res = await request(createNode({ upstreamTlsInsecure: true }).app).get(`/proxy/https://${b}`);

      expect(res.status).toBe(200);
      expect(res.body).toEqual({ status: 200, service: "svc-b", message: "Request processed successfully" });
    });

    it("refuses a self-signed hop when verification is on", async () => {
      const b = await startTlsNode("svc-b");

      const res = await request(createNode({ upstreamTlsInsecure: false }).app).get(`/proxy/https://${b}`);

      expect(res.status).toBe(502);
      expect(res.text.startsWith(`Next hop error: Upstream https://${b}/ failed: `)).toBe(true);
    });
  });

  describe("header logging", () => {
    function loggingNode(logHeaders: boolean) {
      const { logger, lines } = captureLogger();
      const server = ProxyServiceFactory.createServer(testConfig({ logHeaders }), logger, undefined, {
        random: new FixedRandom(0),
      });
      cleanup.push(() => server.stop());
      return { server, lines };
    }

    it("logs headers with sensitive values masked", async () => {
      const { server, lines } = loggingNode(true);

      await request(server.app)
        .get("/")
        .set("x-request-id", "req-7")
        .set("authorization", "Bearer test-secret")
        .set("x-custom", "visible");

      const requestLine = lines.find((line) => line.msg === "Request headers");
      expect(requestLine).toMatchObject({
        service: "svc-a",
        request_id: "req-7",
        request_headers: { authorization: "[REDACTED]", "x-custom": "visible" },
      });

      const responseLine = lines.find((line) => line.msg === "Response headers");
      expect(responseLine?.response_headers).toEqual({ "content-type": "application/json", "x-request-id": "req-7" });
    });

    it("logs the next hop's headers and the headers relayed from them", async () => {
      const upstream = await upstreamFor();
      const { server, lines } = loggingNode(true);

      await request(server.app).get(`/proxy/127.0.0.1:${upstream.port}`).set("x-request-id", "req-8");

      const upstreamLine = lines.find((line) => line.msg === "Upstream response headers");
      expect(upstreamLine).toMatchObject({ upstream_headers: { "x-upstream": "echo" } });

      const responseLine = lines.find((line) => line.msg === "Response headers");
      expect(responseLine).toMatchObject({
        response_headers: { "x-upstream": "echo", "x-request-id": "req-8", "content-type": "application/json" },
      });
    });

    it("stays quiet about headers unless enabled", async () => {
      const { server, lines } = loggingNode(false);

      await request(server.app).get("/");

      expect(lines.some((line) => line.msg === "Request headers")).toBe(false);
      expect(lines.some((line) => line.msg === "Request completed")).toBe(true);
    });
  });
});
