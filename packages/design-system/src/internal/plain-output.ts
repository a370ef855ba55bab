/** `HOSTFORM_OUTPUT=plain` writes log lines to stdout without colour or clack framing. */
export function isPlainOutput(env: { HOSTFORM_OUTPUT?: string } = process.env): boolean {
  return env.HOSTFORM_OUTPUT?.toLowerCase() === "plain";
}
