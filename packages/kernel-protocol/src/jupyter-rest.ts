import { z } from "zod";

export const KernelSpecModelSchema = z
  .object({
    name: z.string(),
    spec: z
      .object({
        display_name: z.string(),
        language: z.string().optional(),
      })
      .passthrough(),
  })
  .passthrough();

export const KernelSpecsResponseSchema = z
  .object({
    default: z.string().optional(),
    kernelspecs: z.record(z.string(), KernelSpecModelSchema).default({}),
  })
  .passthrough();

export const KernelModelSchema = z
  .object({
    id: z.string().min(1),
    name: z.string(),
    execution_state: z.string().optional(),
  })
  .passthrough();

export type KernelSpecModel = z.infer<typeof KernelSpecModelSchema>;
export type KernelSpecsResponse = z.infer<typeof KernelSpecsResponseSchema>;
export type KernelModel = z.infer<typeof KernelModelSchema>;

export class JupyterServerError extends Error {
  constructor(
    public readonly statusCode: number,
    message: string
  ) {
    super(message);
    this.name = "JupyterServerError";
  }
}

export interface JupyterServerClientOptions {
  baseUrl: string;
  token?: string;
  fetch?: typeof fetch;
}

/** REST calls against a Jupyter server's `/api` routes. */
export class JupyterServerClient {
  private readonly baseUrl: string;
  private readonly token?: string;
  private readonly fetchImpl: typeof fetch;

  constructor(options: JupyterServerClientOptions) {
    this.baseUrl = options.baseUrl;
    this.token = options.token;
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
  }

  async listKernelSpecs(): Promise<KernelSpecsResponse> {
    return this.request("api/kernelspecs", KernelSpecsResponseSchema);
  }

  async listKernels(): Promise<KernelModel[]> {
    return this.request("api/kernels", z.array(KernelModelSchema));
  }

  async startKernel(name: string): Promise<KernelModel> {
    return this.request("api/kernels", KernelModelSchema, {
      method: "POST",
      body: JSON.stringify({ name }),
    });
  }

  async shutdownKernel(kernelId: string): Promise<void> {
    const path = `api/kernels/${encodeURIComponent(kernelId)}`;
    const response = await this.fetchImpl(this.url(path), {
      method: "DELETE",
      headers: this.headers(),
    });
    if (!response.ok && response.status !== 404) {
      throw new JupyterServerError(
        response.status,
        `DELETE /${path} failed with status ${response.status}`
      );
    }
  }

  url(path: string): string {
    const url = new URL(this.baseUrl);
    const base = url.pathname.endsWith("/") ? url.pathname : `${url.pathname}/`;
    url.pathname = `${base}${path}`;
    url.search = "";
    return url.toString();
  }

  private headers(): Record<string, string> {
    const headers: Record<string, string> = {
      "Content-Type": "application/json",
    };
    if (this.token) {
      headers.Authorization = `token ${this.token}`;
    }
    return headers;
  }

  private async request<T>(
    path: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    init: { method?: string; body?: string } = {}
  ): Promise<T> {
    const method = init.method ?? "GET";
    const response = await this.fetchImpl(this.url(path), {
      method,
      body: init.body,
      headers: this.headers(),
    });
    if (!response.ok) {
      throw new JupyterServerError(
        response.status,
        `${method} /${path} failed with status ${response.status}`
      );
    }
    const payload: unknown = await response.json();
    return schema.parse(payload);
  }
}
