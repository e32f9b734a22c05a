import type { BenchmarkInstance, Setting, System } from "../runscript/model.js";

export interface ComposedCmdline {
  pre: string[];
  post: string[];
}

function present(...parts: Array<string | null | undefined>): string[] {
  return parts.filter((p): p is string => typeof p === "string" && p.trim().length > 0);
}

/** System, then setting, then instance (group members in declaration order). */
export function composeCmdline(
  system: Pick<System, "cmdline" | "cmdlinePost">,
  setting: Pick<Setting, "cmdline" | "cmdlinePost">,
  instance: Pick<BenchmarkInstance, "cmdline" | "cmdlinePost">
): ComposedCmdline {
  return {
    pre: present(system.cmdline, setting.cmdline, ...instance.cmdline),
    post: present(system.cmdlinePost, setting.cmdlinePost, ...instance.cmdlinePost)
  };
}
