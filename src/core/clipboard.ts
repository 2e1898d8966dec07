import { execa } from "execa";

export interface ClipboardCommand {
  file: string;
  args: string[];
}

/**
 * Pick the clipboard command for the platform. Linux prefers wl-copy when a
 * Wayland session is present, otherwise xclip.
 */
export function clipboardCommand(
  platform: NodeJS.Platform = process.platform,
  env: NodeJS.ProcessEnv = process.env,
): ClipboardCommand {
  switch (platform) {
    case "darwin":
      return { file: "pbcopy", args: [] };
    case "win32":
      return { file: "clip", args: [] };
    default:
      if (env["WAYLAND_DISPLAY"]) {
        return { file: "wl-copy", args: [] };
      }
      return { file: "xclip", args: ["-selection", "clipboard"] };
  }
}

/**
 * Pipe `text` into the platform clipboard command.
 */
export async function copyToClipboard(
  text: string,
  command: ClipboardCommand = clipboardCommand(),
): Promise<void> {
  try {
    await execa(command.file, command.args, { input: text });
  } catch (err: unknown) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new Error(`Failed to copy to clipboard with ${command.file}: ${reason}`);
  }
}
