/**
 * Reserved codes and ranking parameters shared by every stage of the roll-up.
 */
export interface RollupSettings {
  /** Group code for registrants without an active membership. */
  readonly unallocatedGroupCode: string;
  /** Replaces a missing name or location code. */
  readonly unknownLabel: string;
  /** Replaces a missing parent grouping code. */
  readonly unknownParentCode: string;
  readonly decileCount: number;
}

export const ROLLUP_SETTINGS: RollupSettings = {
  unallocatedGroupCode: 'U',
  unknownLabel: 'Unknown',
  unknownParentCode: 'UNK',
  decileCount: 10,
};
