import type { InputRequestContent } from "@cellterm/kernel-protocol";
import type { KernelSpecMap } from "./specs.js";

export interface ConfirmationSurface {
  show(message: string, onConfirm: () => void): void;
}

export interface NoticeSurface {
  show(message: string): void;
}

export interface KernelPickerRequest<Tab> {
  tab: Tab;
  message?: string;
  specs: KernelSpecMap;
}

export interface KernelPickerSurface<Tab = unknown> {
  show(request: KernelPickerRequest<Tab>): void;
}

export interface InputSurface {
  prompt(content: InputRequestContent, reply: (value: string) => void): void;
}

/** UI capabilities a host may or may not provide to a tab. */
export interface TabSurfaces<Tab = unknown> {
  confirm?: ConfirmationSurface;
  notice?: NoticeSurface;
  picker?: KernelPickerSurface<Tab>;
  input?: InputSurface;
}

export interface NoticeState {
  noKernelsShown: boolean;
}

/** Notices already shown in this process. */
export const processNotices: NoticeState = { noKernelsShown: false };
