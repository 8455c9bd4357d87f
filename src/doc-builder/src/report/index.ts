export { ReportGenerator, ReportConfig, ReportFormat, isReportFormat, formatEdits } from './ReportGenerator';
