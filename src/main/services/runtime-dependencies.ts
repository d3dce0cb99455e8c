import { execFile } from "node:child_process";
import { promisify } from "node:util";

const execFileAsync = promisify(execFile);

export interface RuntimeDependency {
  command: string;
  args: string[];
  required: boolean;
  label: string;
}

export interface RuntimeDependencyReport {
  missingRequired: string[];
  missingOptional: string[];
}

export function audioDependencies(mpvExecutable = "mpv"): RuntimeDependency[] {
  return [
    {
      command: mpvExecutable,
      args: ["--version"],
      required: true,
      label: "mpv"
    }
  ];
}

export type CommandProbe = (command: string, args: string[]) => Promise<boolean>;

/** Only a missing executable counts as unavailable; any other failure means it ran. */
export async function isCommandAvailable(command: string, args: string[]): Promise<boolean> {
  try {
    await execFileAsync(command, args, { timeout: 3_000 });
    return true;
  } catch (error) {
    const candidate = error as NodeJS.ErrnoException;
    return candidate.code !== "ENOENT";
  }
}

export async function checkRuntimeDependencies(
  dependencies: readonly RuntimeDependency[] = audioDependencies(),
  probe: CommandProbe = isCommandAvailable
): Promise<RuntimeDependencyReport> {
  const report: RuntimeDependencyReport = {
    missingRequired: [],
    missingOptional: []
  };

  for (const dependency of dependencies) {
    if (await probe(dependency.command, dependency.args)) {
      continue;
    }

    if (dependency.required) {
      report.missingRequired.push(dependency.label);
    } else {
      report.missingOptional.push(dependency.label);
    }
  }

  return report;
}

export function describeMissingDependencies(report: RuntimeDependencyReport): string | null {
  if (report.missingRequired.length === 0) {
    return null;
  }

  return `${report.missingRequired.join(", ")} not found on PATH; playback is disabled`;
}
