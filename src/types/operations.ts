export interface OperationSpec<C = unknown> {
  name: string;
  description?: string;
  input_schema?: Record<string, string>;
  output_schema?: Record<string, string>;
  /** Disabled operations are treated as missing. Defaults to true. */
  enabled?: boolean;
  invoke(args: Record<string, unknown>, context: C, signal?: AbortSignal): Promise<Record<string, unknown>>;
}

export type OperationRegistry<C = unknown> = Record<string, OperationSpec<C>>;
