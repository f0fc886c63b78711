export interface ErrorDetails {
  type: string;
  error: string;
  status: number;
  details?: unknown;
  stack?: string;
}
