export class TransportError extends Error {
  constructor(
    public readonly args: readonly string[],
    public readonly stderr: string,
  ) {
    super(stderr || `Device command failed: ${args.join(" ")}`);
    this.name = "TransportError";
  }
}

export class EmptyCaptureError extends Error {
  constructor(
    public readonly source: "accessibility-tree" | "screenshot",
    detail?: string,
  ) {
    super(detail ? `Empty ${source} capture: ${detail}` : `Empty ${source} capture`);
    this.name = "EmptyCaptureError";
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
