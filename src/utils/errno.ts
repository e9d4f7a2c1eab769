/** `code` of a Node system error (`ENOENT`, `EACCES`, …), if the value carries one. */
export function errnoCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") return err.code;
  return undefined;
}
