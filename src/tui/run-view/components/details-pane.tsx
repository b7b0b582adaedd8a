import { Box, Text } from "ink";
import { clipText, formatPhaseLine } from "../format.js";
import type { JobRow } from "../state.js";
import { colorForStatus, renderStatusGlyph } from "../utils/status.js";

const JOB_COLUMN_WIDTH = 34;

export type DetailsPaneProps = {
	jobs: JobRow[];
	selectedIndex: number;
	logLines: string[];
	spinnerIndex: number;
};

export function DetailsPane({
	jobs,
	selectedIndex,
	logLines,
	spinnerIndex,
}: DetailsPaneProps): JSX.Element {
	const selected = jobs[selectedIndex];

	return (
		<Box flexDirection="row">
			<Box flexDirection="column" width={JOB_COLUMN_WIDTH}>
				<Text dimColor>Jobs</Text>
				{jobs.map((job, index) => {
					const isSelected = index === selectedIndex;
					const label = `${renderStatusGlyph(job.status, spinnerIndex)} ${job.jobName}`;
					return (
						<Text
							key={job.jobName}
							color={colorForStatus(job.status)}
							backgroundColor={isSelected ? "gray" : undefined}
							bold={isSelected}
						>
							{clipText(label, JOB_COLUMN_WIDTH - 2).padEnd(JOB_COLUMN_WIDTH - 2)}
						</Text>
					);
				})}
			</Box>
			<Box flexDirection="column" marginLeft={1} flexGrow={1}>
				<Text dimColor>Phases</Text>
				{selected ? (
					selected.phases.map((phase) => (
						<Text key={phase.phaseId} color={colorForStatus(phase.status)}>
							{renderStatusGlyph(phase.status, spinnerIndex)} {formatPhaseLine(phase)}
							{phase.lastTask ? ` · ${phase.lastTask}` : ""}
						</Text>
					))
				) : (
					<Text dimColor>No job selected</Text>
				)}
				<Box flexDirection="column" marginTop={1}>
					{logLines.length === 0 ? (
						<Text dimColor>Waiting for output...</Text>
					) : (
						logLines.map((line, lineIndex) => (
							<Text key={`log-${lineIndex}`} dimColor>
								{line}
							</Text>
						))
					)}
				</Box>
			</Box>
		</Box>
	);
}
