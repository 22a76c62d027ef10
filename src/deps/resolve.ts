import process from "node:process";
import { createInterface } from "node:readline/promises";
import { MissingDependencyError } from "../errors.js";
import { logger } from "../logger.js";
import { commandExists, describeFailure, runCommand, succeeded, type CommandRunner } from "../util/shell.js";
import type { RunConfig } from "../types.js";

export interface RequiredTool {
  /** Name or path that is looked up on PATH. */
  bin: string;
  /** Package name handed to the platform installer. */
  pkg: string;
}

export interface InstallStep {
  command: string;
  args: string[];
  env?: Record<string, string>;
}

export type Confirm = (question: string) => Promise<boolean>;

const installersByPlatform: Partial<Record<NodeJS.Platform, string[]>> = {
  darwin: ["brew"],
  linux: ["apt-get", "dnf", "yum", "pacman", "zypper", "apk"],
  win32: ["winget", "choco", "scoop"],
};

const wingetIds: Record<string, string> = {
  ffmpeg: "Gyan.FFmpeg",
  "yt-dlp": "yt-dlp.yt-dlp",
};

export function requiredTools(config: Pick<RunConfig, "ytdlpBin" | "ffmpegBin">): RequiredTool[] {
  return [
    { bin: config.ytdlpBin, pkg: "yt-dlp" },
    { bin: config.ffmpegBin, pkg: "ffmpeg" },
  ];
}

export function installerCandidates(platform: NodeJS.Platform): string[] {
  return installersByPlatform[platform] ?? [];
}

export function buildInstallSteps(installer: string, packages: string[]): InstallStep[] {
  switch (installer) {
    case "brew":
      return [
        {
          command: "brew",
          args: ["install", "--formula", ...packages],
          env: {
            HOMEBREW_NO_AUTO_UPDATE: "1",
            HOMEBREW_NO_INSTALL_CLEANUP: "1",
            HOMEBREW_NO_ANALYTICS: "1",
          },
        },
      ];
    case "apt-get":
      return [
        { command: "sudo", args: ["-n", "apt-get", "update"] },
        {
          command: "sudo",
          args: ["-n", "apt-get", "install", "-y", "--no-install-recommends", "--no-upgrade", ...packages],
        },
      ];
    case "dnf":
      return [
        { command: "sudo", args: ["-n", "dnf", "install", "-y", "--setopt=install_weak_deps=False", ...packages] },
      ];
    case "yum":
      return [{ command: "sudo", args: ["-n", "yum", "install", "-y", ...packages] }];
    case "pacman":
      return [{ command: "sudo", args: ["-n", "pacman", "-S", "--noconfirm", "--needed", ...packages] }];
    case "zypper":
      return [{ command: "sudo", args: ["-n", "zypper", "install", "-y", "--no-recommends", ...packages] }];
    case "apk":
      return [{ command: "sudo", args: ["-n", "apk", "add", "--no-cache", ...packages] }];
    case "winget":
      return [
        {
          command: "winget",
          args: [
            "install",
            "--silent",
            "--accept-package-agreements",
            "--accept-source-agreements",
            "--exact",
            ...packages.map((pkg) => wingetIds[pkg] ?? pkg),
          ],
        },
      ];
    case "choco":
      return [{ command: "choco", args: ["install", "-y", "--no-progress", ...packages] }];
    case "scoop":
      return [{ command: "scoop", args: ["install", ...packages] }];
    default:
      throw new Error(`Unsupported installer: ${installer}`);
  }
}

export const promptConfirm: Confirm = async (question) => {
  if (!process.stdin.isTTY) {
    return false;
  }

  const rl = createInterface({ input: process.stdin, output: process.stderr });
  try {
    const answer = await rl.question(question);
    return ["y", "yes"].includes(answer.trim().toLowerCase());
  } finally {
    rl.close();
  }
};

async function findMissing(tools: RequiredTool[], run: CommandRunner): Promise<RequiredTool[]> {
  const missing: RequiredTool[] = [];
  for (const tool of tools) {
    if (!(await commandExists(tool.bin, run))) {
      missing.push(tool);
    }
  }
  return missing;
}

async function chooseInstaller(platform: NodeJS.Platform, run: CommandRunner): Promise<string | undefined> {
  for (const candidate of installerCandidates(platform)) {
    if (await commandExists(candidate, run)) {
      return candidate;
    }
  }
  return undefined;
}

export async function installPackages(
  packages: string[],
  options: { platform?: NodeJS.Platform; run?: CommandRunner } = {},
): Promise<void> {
  const platform = options.platform ?? process.platform;
  const run = options.run ?? runCommand;

  const installer = await chooseInstaller(platform, run);
  if (!installer) {
    throw new MissingDependencyError(
      `Cannot determine a package manager. Install manually: ${packages.join(", ")}`,
      packages,
    );
  }

  logger.info({ installer, packages }, "Installing dependencies");

  for (const step of buildInstallSteps(installer, packages)) {
    const result = await run(step.command, step.args, {
      env: step.env ? { ...process.env, ...step.env } : undefined,
      onLine: (line) => logger.debug({ installer }, line),
    });

    if (!succeeded(result)) {
      logger.error({ installer, err: describeFailure(step.command, result) }, "Auto-install failed");
      throw new MissingDependencyError(
        `Failed to install: ${packages.join(", ")}. Install manually via your package manager`,
        packages,
      );
    }
  }

  logger.info({ installer }, "Dependencies installed");
}

/**
 * Makes sure every required binary is on PATH, installing the missing ones
 * when the user allows it.
 */
export async function ensureDependencies(options: {
  tools: RequiredTool[];
  yes: boolean;
  platform?: NodeJS.Platform;
  run?: CommandRunner;
  confirm?: Confirm;
}): Promise<void> {
  const run = options.run ?? runCommand;
  const confirm = options.confirm ?? promptConfirm;

  const missing = await findMissing(options.tools, run);
  if (missing.length === 0) {
    return;
  }

  const names = missing.map((tool) => tool.bin);
  const list = names.join(", ");

  const approved = options.yes || (await confirm(`Missing binaries: ${list}. Install automatically? [y/N]: `));
  if (!approved) {
    throw new MissingDependencyError(
      `Required: ${list}. Install manually or run with --yes for auto-install`,
      names,
    );
  }

  await installPackages(
    missing.map((tool) => tool.pkg),
    { platform: options.platform, run },
  );

  const stillMissing = await findMissing(missing, run);
  if (stillMissing.length > 0) {
    const stillNames = stillMissing.map((tool) => tool.bin);
    throw new MissingDependencyError(`Still not found after install: ${stillNames.join(", ")}`, stillNames);
  }
}
