// Shared shapes for the raster timing generator.

export interface TimingProfile {
  readonly hVisible: number;
  readonly hFrontPorch: number;
  readonly hSyncPulse: number;
  readonly hBackPorch: number;
  readonly hTotal: number;
  readonly vVisible: number;
  readonly vFrontPorch: number;
  readonly vSyncPulse: number;
  readonly vBackPorch: number;
  readonly vTotal: number;
}

export interface TimingOutputs {
  active: boolean;
  hSync: boolean;
  vSync: boolean;
}

// Full generator state: counters plus the registered (pre-gate) outputs
export interface TimingState {
  hPos: number;
  vPos: number;
  active: boolean;
  hSync: boolean;
  vSync: boolean;
}

export type TimingSignal = 'active' | 'hSync' | 'vSync';

export interface TimingEdge {
  tick: number;
  signal: TimingSignal;
  level: boolean;
  hPos: number;
  vPos: number;
}
