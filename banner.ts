export const TOOLCHAIN_VERSION = "1.0.0";

export const BANNER = `
  ┌──────────────────────────────────┐
  │  STACK MAC  v${TOOLCHAIN_VERSION.padEnd(20)}│
  │  ┌───┐                           │
  │  │ █ │  Stack-Based VM           │
  │  ├───┤  12 Base Opcodes          │
  │  │ █ │  Extension Support        │
  │  └───┘                           │
  │  compile | run | disasm          │
  └──────────────────────────────────┘
`;

const TRUTHY = new Set(["1", "true", "yes"]);

/**
 * The banner is shown only on an interactive terminal, and never when
 * `--no-banner` or STACKMAC_NO_BANNER is set.
 */
export function shouldShowBanner(
  noBannerFlag: boolean,
  env: NodeJS.ProcessEnv = process.env,
  isTTY: boolean = process.stdout.isTTY === true,
): boolean {
  if (noBannerFlag) return false;
  if (TRUTHY.has((env.STACKMAC_NO_BANNER ?? "").toLowerCase())) return false;
  return isTTY;
}

export function formatBanner(toolName?: string): string {
  return toolName ? `${BANNER}\n Running: ${toolName}\n` : BANNER;
}
