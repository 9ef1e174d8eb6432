export type PermissionMode = 'interactive' | 'auto-accept';

const PERMISSION_DESCRIPTIONS: Record<PermissionMode, string> = {
  interactive: 'file writes and edits ask for confirmation',
  'auto-accept': 'file writes and edits run without confirmation',
};

export class SessionState {
  private permissionMode: PermissionMode = 'interactive';
  private modelName: string;

  constructor(modelName: string, permissionMode?: PermissionMode) {
    this.modelName = modelName;
    if (permissionMode) {
      this.permissionMode = permissionMode;
    }
  }

  setModelName(modelName: string): void {
    this.modelName = modelName;
  }

  getModelName(): string {
    return this.modelName;
  }

  setPermissionMode(mode: PermissionMode): void {
    this.permissionMode = mode;
  }

  getPermissionMode(): PermissionMode {
    return this.permissionMode;
  }

  isAutoApproved(): boolean {
    return this.permissionMode === 'auto-accept';
  }

  permissionSummary(): string {
    return `${this.permissionMode} (${PERMISSION_DESCRIPTIONS[this.permissionMode]})`;
  }
}
