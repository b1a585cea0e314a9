import type { JupyterServerClient } from "@cellterm/kernel-protocol";

export interface KernelSpecInfo {
  name: string;
  displayName: string;
  language?: string;
}

export type KernelSpecMap = Record<string, KernelSpecInfo>;

export interface KernelSpecSource {
  listSpecs(): Promise<KernelSpecMap>;
}

export class StaticKernelSpecSource implements KernelSpecSource {
  constructor(private readonly specs: KernelSpecInfo[] = []) {}

  async listSpecs(): Promise<KernelSpecMap> {
    return Object.fromEntries(this.specs.map((spec) => [spec.name, spec]));
  }
}

/** Kernel specs advertised by a running Jupyter server. */
export class JupyterKernelSpecSource implements KernelSpecSource {
  constructor(private readonly client: JupyterServerClient) {}

  async listSpecs(): Promise<KernelSpecMap> {
    const { kernelspecs } = await this.client.listKernelSpecs();
    const specs: KernelSpecMap = {};
    for (const [name, model] of Object.entries(kernelspecs)) {
      specs[name] = {
        name,
        displayName: model.spec.display_name,
        language: model.spec.language,
      };
    }
    return specs;
  }
}
