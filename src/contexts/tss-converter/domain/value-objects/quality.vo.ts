export type IssueLevel = 'info' | 'warning' | 'error';

export interface QualityIssue {
  level: IssueLevel;
  step: string;
  category: string;
  message: string;
  details?: string;
  timestamp: string;
}

export interface QualitySummary {
  qualityScore: number;
  totalIssues: number;
  warningsCount: number;
  errorsCount: number;
  dataQualityIssues: number;
  processingIssues: number;
  processingTime: number | null;
  stepsCompleted: string[];
  recommendations: string[];
}

export interface QualityReport {
  issues: QualityIssue[];
  statistics: Record<string, number>;
  summary: QualitySummary;
}
