import { FatalPreconditionError } from "./errors.js";

export type SelectionPolicy =
  | { kind: "ids"; ids: string[] }
  | { kind: "limit"; limit: number }
  | { kind: "all" };

export type SelectionFlags = {
  ids?: string[];
  limit?: number;
  all?: boolean;
};

/** Exactly one of `ids`, `limit` or `all` must be given. */
export function parseSelection(flags: SelectionFlags): SelectionPolicy {
  const modes: SelectionPolicy[] = [];
  if (flags.ids !== undefined) {
    const ids = [...new Set(flags.ids.map((id) => id.trim()).filter(Boolean))];
    if (ids.length === 0) {
      throw new FatalPreconditionError("--ids requires at least one id");
    }
    modes.push({ kind: "ids", ids });
  }
  if (flags.limit !== undefined) {
    if (!Number.isInteger(flags.limit) || flags.limit <= 0) {
      throw new FatalPreconditionError(
        `--limit must be a positive integer (got ${flags.limit})`
      );
    }
    modes.push({ kind: "limit", limit: flags.limit });
  }
  if (flags.all) modes.push({ kind: "all" });

  const [only] = modes;
  if (!only || modes.length > 1) {
    throw new FatalPreconditionError(
      "Specify exactly one selection mode: --ids <id...>, --limit <n> or --all"
    );
  }
  return only;
}

export function describeSelection(policy: SelectionPolicy): string {
  switch (policy.kind) {
    case "ids":
      return `${policy.ids.length} requested id(s)`;
    case "limit":
      return `up to ${policy.limit} most recently watched`;
    case "all":
      return "all pending";
  }
}
