export interface ReportSink {
  readonly location: string;
  write(text: string): Promise<void>;
}
