import { readFile } from "node:fs/promises";
import { resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { errorMessage, isEnoentError, StorageError, ValidationError } from "../errors.js";

export const BUILTIN_TEAM_IDS = ["finance"] as const;
export type BuiltInTeamId = (typeof BUILTIN_TEAM_IDS)[number];

interface TeamMemberDefinition {
  name: string;
  fileName: string;
}

const BUILTIN_TEAM_DEFINITIONS: Record<BuiltInTeamId, readonly TeamMemberDefinition[]> = {
  finance: [
    { name: "Risk_Analyst", fileName: "risk-analyst.md" },
    { name: "Portfolio_Manager", fileName: "portfolio-manager.md" },
    { name: "Data_Analyst", fileName: "data-analyst.md" },
    { name: "Research_Analyst", fileName: "research-analyst.md" }
  ]
};

const REGISTRY_DIR = fileURLToPath(new URL(".", import.meta.url));
const PACKAGE_DIR = resolve(REGISTRY_DIR, "..", "..", "..");

export interface TeamMemberTemplate {
  name: string;
  instructions: string;
  tags: string[];
}

/** Loads a built-in team and fills `{{placeholder}}` values into each member's instructions. */
export async function loadTeamTemplate(
  teamId: BuiltInTeamId,
  values: Record<string, string>
): Promise<TeamMemberTemplate[]> {
  const members: TeamMemberTemplate[] = [];

  for (const definition of BUILTIN_TEAM_DEFINITIONS[teamId]) {
    const raw = await readBuiltInTemplate(teamId, definition.fileName);
    const instructions = interpolate(raw, values).trim();
    if (!instructions) {
      throw new StorageError(`Template for team member "${definition.name}" is empty: ${definition.fileName}`);
    }

    members.push({
      name: definition.name,
      instructions,
      tags: [`team:${teamId}`]
    });
  }

  return members;
}

export function interpolate(template: string, values: Record<string, string>): string {
  return template.replace(/\{\{\s*([A-Za-z0-9_]+)\s*\}\}/g, (placeholder: string, key: string) => {
    const value = values[key];
    if (value === undefined) {
      throw new ValidationError(`Missing template value for ${placeholder}`);
    }
    return value;
  });
}

async function readBuiltInTemplate(teamId: BuiltInTeamId, fileName: string): Promise<string> {
  const candidatePaths = [
    resolve(REGISTRY_DIR, "builtins", teamId, fileName),
    resolve(PACKAGE_DIR, "src", "swarm", "teams", "builtins", teamId, fileName)
  ];

  for (const path of candidatePaths) {
    try {
      return await readFile(path, "utf8");
    } catch (error) {
      if (isEnoentError(error)) {
        continue;
      }
      throw new StorageError(`Failed to read team template ${path}: ${errorMessage(error)}`, error);
    }
  }

  throw new StorageError(`Missing built-in team template: ${teamId}/${fileName}`);
}
