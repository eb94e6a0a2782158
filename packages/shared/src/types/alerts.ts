export type ThresholdAlertKind = 'CPU' | 'DISK' | 'MEM' | 'NET';
export type AlertKind = ThresholdAlertKind | 'CONNECTIVITY';
export type AlertSeverity = 'breach';

interface AlertBase {
  readonly timestamp: Date;
  readonly message: string;
  readonly severity: AlertSeverity;
}

export interface ThresholdAlert extends AlertBase {
  readonly kind: ThresholdAlertKind;
  readonly value: number;
  readonly threshold: number;
}

export interface ConnectivityAlert extends AlertBase {
  readonly kind: 'CONNECTIVITY';
  readonly host: string;
}

export type Alert = ThresholdAlert | ConnectivityAlert;
