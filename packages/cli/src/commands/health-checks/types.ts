import type { ValidationIssue } from "@ocfg/core";

export interface DiagnosticResult {
  name: string;
  status: "pass" | "fail" | "warn";
  message: string;
  fix?: string;
  /** Validator findings behind this result */
  issues?: ValidationIssue[];
}

export interface DoctorResult {
  success: boolean;
  checks: DiagnosticResult[];
  summary: {
    passed: number;
    failed: number;
    warnings: number;
  };
}
