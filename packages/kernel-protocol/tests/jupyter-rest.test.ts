import { describe, expect, it, vi } from "vitest";
import { JupyterServerClient, JupyterServerError } from "../src/index.js";

const jsonResponse = (body: unknown, status = 200) =>
  new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });

describe("JupyterServerClient", () => {
  it("lists kernel specs with the token header", async () => {
    const fetchMock = vi.fn<Parameters<typeof fetch>, ReturnType<typeof fetch>>(
      async () =>
        jsonResponse({
          default: "python3",
          kernelspecs: {
            python3: {
              name: "python3",
              spec: { display_name: "Python 3", language: "python" },
            },
          },
        })
    );
    const client = new JupyterServerClient({
      baseUrl: "http://localhost:8888/lab",
      token: "test-secret",
      fetch: fetchMock,
    });

    const specs = await client.listKernelSpecs();

    expect(specs.default).toBe("python3");
    expect(specs.kernelspecs.python3?.spec.display_name).toBe("Python 3");
    const [url, init] = fetchMock.mock.calls[0] ?? [];
    expect(url).toBe("http://localhost:8888/lab/api/kernelspecs");
    expect(init?.headers).toEqual({
      "Content-Type": "application/json",
      Authorization: "token test-secret",
    });
  });

  it("starts a kernel by name", async () => {
    const fetchMock = vi.fn<Parameters<typeof fetch>, ReturnType<typeof fetch>>(
      async () => jsonResponse({ id: "k-1", name: "python3" }, 201)
    );
    const client = new JupyterServerClient({
      baseUrl: "http://localhost:8888",
      fetch: fetchMock,
    });

    const kernel = await client.startKernel("python3");

    expect(kernel.id).toBe("k-1");
    const [url, init] = fetchMock.mock.calls[0] ?? [];
    expect(url).toBe("http://localhost:8888/api/kernels");
    expect(init?.method).toBe("POST");
    expect(init?.body).toBe('{"name":"python3"}');
  });

  it("raises a server error for failed requests", async () => {
    const client = new JupyterServerClient({
      baseUrl: "http://localhost:8888",
      fetch: async () => jsonResponse({ message: "Forbidden" }, 403),
    });
    const failure = client.listKernels();
    await expect(failure).rejects.toBeInstanceOf(JupyterServerError);
    await expect(failure).rejects.toMatchObject({ statusCode: 403 });
  });

  it("treats shutting down a missing kernel as done", async () => {
    const client = new JupyterServerClient({
      baseUrl: "http://localhost:8888",
      fetch: async () => new Response(null, { status: 404 }),
    });
    await expect(client.shutdownKernel("gone")).resolves.toBeUndefined();
  });
});
