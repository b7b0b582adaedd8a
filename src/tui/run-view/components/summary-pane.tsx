import { Box, Text } from "ink";
import { formatPhaseLine } from "../format.js";
import type { JobRow } from "../state.js";
import { colorForStatus, renderStatusGlyph } from "../utils/status.js";

export type SummaryPaneProps = {
	jobs: JobRow[];
	spinnerIndex: number;
};

export function SummaryPane({ jobs, spinnerIndex }: SummaryPaneProps): JSX.Element {
	return (
		<Box flexDirection="column" borderStyle="round" paddingX={2} paddingY={1}>
			<Text dimColor>Summary</Text>
			{jobs.length === 0 ? <Text dimColor>No jobs planned.</Text> : null}
			{jobs.map((job) => (
				<Box key={job.jobName} flexDirection="column">
					<Text color={colorForStatus(job.status)}>
						{renderStatusGlyph(job.status, spinnerIndex)} {job.jobName}
					</Text>
					{job.phases.map((phase) => (
						<Text key={`${job.jobName}-${phase.phaseId}`} color={colorForStatus(phase.status)}>
							{"  "}
							{renderStatusGlyph(phase.status, spinnerIndex)} {formatPhaseLine(phase)}
						</Text>
					))}
				</Box>
			))}
		</Box>
	);
}
