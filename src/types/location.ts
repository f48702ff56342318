// types/location.ts — Places a robot can stand

export type Location =
  | 'cafeteria'
  | 'foo-mine'
  | 'bar-mine'
  | 'assembly-line'
  | 'material-store'
  | 'robots-store'
  | 'on-my-way';

export interface LocationInfo {
  key: Location;
  name: string;
  /** false for places a robot only passes through */
  reachable: boolean;
}
