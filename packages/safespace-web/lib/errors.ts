/** Error body returned by the chat API */
export interface ApiErrorBody {
  error: string;
  message: string;
}

export class ApiError extends Error {
  constructor(
    public readonly status: number,
    public readonly body: ApiErrorBody | null,
  ) {
    super(body?.message ?? `API Error: ${status}`);
    this.name = "ApiError";
  }

  /** True when the server has no LLM credential configured */
  get isConfigurationError(): boolean {
    return this.body?.error === "configuration_error";
  }
}

export function isApiError(error: unknown): error is ApiError {
  return error instanceof ApiError;
}

function isApiErrorBody(value: unknown): value is ApiErrorBody {
  return typeof value === "object" && value !== null && "error" in value && "message" in value && typeof value.error === "string" && typeof value.message === "string";
}

export async function readErrorBody(response: Response): Promise<ApiErrorBody | null> {
  const body: unknown = await response.json().catch(() => null);
  return isApiErrorBody(body) ? body : null;
}
