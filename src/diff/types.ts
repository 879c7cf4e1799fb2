export type ChangeType = 'added' | 'modified' | 'deleted' | 'renamed';

export const CHANGE_TYPE_LABELS: Record<ChangeType, string> = {
  added: 'Added',
  modified: 'Modified',
  deleted: 'Deleted',
  renamed: 'Renamed',
};

interface ChangeCounts {
  readonly filePath: string;
  readonly linesAdded: number;
  readonly linesRemoved: number;
}

/** One file's change. `oldPath` exists exactly when the file was renamed. */
export type Change =
  | (ChangeCounts & { readonly changeType: 'added' | 'modified' | 'deleted'; readonly oldPath?: undefined })
  | (ChangeCounts & { readonly changeType: 'renamed'; readonly oldPath: string });

export type DiffFileEntry = Change & {
  /** Git reported the section as binary; its line counts are meaningless. */
  readonly binary: boolean;
};
