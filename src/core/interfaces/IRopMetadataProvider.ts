/**
 * Frame range and skip setting configured on the ROP itself
 */
export interface RopSettings {
  startFrame: number;
  endFrame: number;
  step: number;
  skipRendered: boolean;
}

/**
 * A render node found under /out of a scene
 */
export interface RopNodeInfo extends RopSettings {
  path: string;
  nodeType: string | null;
}

export interface IRopMetadataProvider {
  getRopSettings(hipPath: string, outNode: string): Promise<RopSettings>;
  listRops(hipPath: string): Promise<RopNodeInfo[]>;
}
