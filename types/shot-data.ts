import type {
  CourtPosition,
  ErrorKind,
  FaultKind,
  ReturnDepth,
  ServeDirection,
  ServeOutcome,
  ShotDirection,
  ShotOutcome,
  ShotType,
} from '@/lib/notation';

export interface Players {
  server: string;
  returner: string;
}

export interface Shot {
  player: string;
  shotType: ShotType;
  direction: ShotDirection; // 'unknown' when no digit was charted
  depth: ReturnDepth | null; // only charted on returns
  position: CourtPosition | null;
  netCord: boolean;
  stopVolley: boolean;
  errorKind: ErrorKind | null;
  outcome: ShotOutcome; // anything but 'in_play' ends the point
  raw: string;
}

export interface Rally {
  code: string;
  shots: readonly Shot[];
}

interface ServeBase {
  server: string;
  rawCode: string;
  direction: ServeDirection;
  lets: number;
  serveAndVolley: boolean;
  faultKind: FaultKind | null;
  outcome: ServeOutcome;
}

export interface FirstServe extends ServeBase {
  attempt: 'first';
}

export interface SecondServe extends ServeBase {
  attempt: 'second';
}

export type Serve = FirstServe | SecondServe;
export type ServeAttempt = Serve['attempt'];

interface PointBase {
  server: string;
  returner: string;
  serverWon: boolean;
}

export interface NotCodedPoint extends PointBase {
  kind: 'not_coded';
}

export interface ServerLostOutrightPoint extends PointBase {
  kind: 'server_lost_outright';
}

export interface ServerWonOutrightPoint extends PointBase {
  kind: 'server_won_outright';
}

export interface CodedPoint extends PointBase {
  kind: 'coded';
  firstServe: FirstServe;
  secondServe: SecondServe | null; // present iff the first serve faulted
  rally: Rally | null; // present iff the terminating serve was returned
}

export type ShotSequence = NotCodedPoint | ServerLostOutrightPoint | ServerWonOutrightPoint | CodedPoint;
export type ShotSequenceKind = ShotSequence['kind'];

export interface PointCodes {
  firstCode: string;
  secondCode: string;
}
