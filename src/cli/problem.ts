import { isTrieSetError } from "../core/errors.js";

export interface FieldError {
  path: string;
  message: string;
}

/** Problem document (RFC 9457 shape); `status` carries the process exit status. */
export interface Problem {
  type: string;
  title: string;
  status: number;
  detail?: string;
  code?: string;
  errors?: FieldError[];
}

export function problem(params: Omit<Problem, "type" | "title"> & { code: string }): Problem {
  const type = `https://errors.latin-trieset.local/${params.code.toLowerCase().replace(/_/g, "-")}`;
  const title = codeToTitle(params.code);
  return {
    type,
    title,
    status: params.status,
    detail: params.detail,
    code: params.code,
    errors: params.errors,
  };
}

export function problemFromError(e: unknown, status: number): Problem {
  if (isTrieSetError(e)) return problem({ status, code: e.code, detail: e.message });
  return problem({ status, code: "INTERNAL", detail: e instanceof Error ? e.message : String(e) });
}

function codeToTitle(code: string): string {
  switch (code) {
    case "INVALID_ARGUMENT":
      return "Invalid argument";
    case "INVALID_CHARACTER":
      return "Invalid character";
    case "INPUT_UNREADABLE":
      return "Input unreadable";
    default:
      return "Internal error";
  }
}
