export interface RatioPitch {
  type: 'ratio';
  numerator: number;
  denominator: number;
}

export interface CentsPitch {
  type: 'cents';
  cents: number;
}

export type Pitch = RatioPitch | CentsPitch;

export interface Scale {
  description: string;
  pitches: Pitch[];
}

export interface ValidationIssue {
  code:
    | 'PITCH_INVALID_RATIO'
    | 'PITCH_NON_FINITE_CENTS'
    | 'DESCRIPTION_MULTILINE'
    | 'DESCRIPTION_COMMENT_PREFIX';
  message: string;
  pitchIndex?: number;
}
