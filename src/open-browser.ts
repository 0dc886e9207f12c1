import { spawn } from "node:child_process";
import process from "node:process";

function browserCommand(url: string): { command: string; args: string[] } {
  switch (process.platform) {
    case "darwin":
      return { command: "open", args: [url] };
    case "win32":
      return { command: "cmd", args: ["/c", "start", "", url] };
    default:
      return { command: "xdg-open", args: [url] };
  }
}

/** Resolves once the opener has started; it is not waited on. */
export function openInBrowser(url: string): Promise<void> {
  const { command, args } = browserCommand(url);

  return new Promise((resolve, reject) => {
    const child = spawn(command, args, { stdio: "ignore", detached: true });

    child.once("error", (error) => {
      reject(new Error(`Unable to open browser: ${error.message}`));
    });

    child.once("spawn", () => {
      child.unref();
      resolve();
    });
  });
}
