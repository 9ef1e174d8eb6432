import { readFile } from 'fs/promises';
import { existsSync } from 'fs';
import { join } from 'path';
import { homedir } from 'os';

export interface InstructionFile {
  path: string;
  content: string;
  level: 'global' | 'project';
}

export const INSTRUCTIONS_FILE = 'AGENTS.md';

/**
 * Loads AGENTS.md instructions: global (~/.deltacode/) first, then the
 * project root. Both are kept; the project file comes last so it wins on
 * conflicts.
 */
export class InstructionsLoader {
  private readonly projectRoot: string;
  private readonly globalDir: string;

  constructor(projectRoot: string = process.cwd(), globalDir: string = join(homedir(), '.deltacode')) {
    this.projectRoot = projectRoot;
    this.globalDir = globalDir;
  }

  async loadInstructionFiles(): Promise<InstructionFile[]> {
    const files: InstructionFile[] = [];
    const global = await this.loadFile(join(this.globalDir, INSTRUCTIONS_FILE), 'global');
    if (global) files.push(global);
    const project = await this.loadFile(join(this.projectRoot, INSTRUCTIONS_FILE), 'project');
    if (project) files.push(project);
    return files;
  }

  async mergeInstructions(): Promise<string> {
    const files = await this.loadInstructionFiles();
    return files
      .filter((file) => file.content.length > 0)
      .map((file) => `# ${INSTRUCTIONS_FILE} (${file.level})\n${file.content}`)
      .join('\n\n');
  }

  private async loadFile(filePath: string, level: InstructionFile['level']): Promise<InstructionFile | null> {
    if (!existsSync(filePath)) {
      return null;
    }
    try {
      const content = await readFile(filePath, 'utf-8');
      return { path: filePath, content: content.trim(), level };
    } catch {
      return null;
    }
  }
}
