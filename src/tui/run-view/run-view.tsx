import { Box, Text, useApp, useInput } from "ink";
import { useCallback, useEffect, useMemo, useRef, useState } from "react";
import type {
	EngineAdapter,
	EngineContext,
	EngineRunResult,
	EngineRuntimeEvent,
	OutputSource,
} from "../../core/engine.js";
import type { RunPlan } from "../../core/types.js";
import { DetailsPane } from "./components/details-pane.js";
import { SummaryPane } from "./components/summary-pane.js";
import { SPINNER_FRAMES, SPINNER_INTERVAL_MS } from "./constants.js";
import { appendLogTail, applyRuntimeEvent, createInitialState } from "./state.js";
import type { RunViewMode } from "./utils/help.js";
import { formatHelpText } from "./utils/help.js";
import { colorForRunStatus, isRunActive, RUN_STATUS_LABELS } from "./utils/status.js";

export type RunViewProps = {
	adapter: EngineAdapter;
	context: EngineContext;
	plan: RunPlan;
	onComplete: (result: EngineRunResult) => void;
};

export function RunView({ adapter, context, plan, onComplete }: RunViewProps): JSX.Element {
	const { exit } = useApp();
	const [state, setState] = useState(() => createInitialState(plan));
	const [viewMode, setViewMode] = useState<RunViewMode>("summary");
	const [selectedJobIndex, setSelectedJobIndex] = useState(0);
	const [quitPromptVisible, setQuitPromptVisible] = useState(false);
	const [spinnerIndex, setSpinnerIndex] = useState(0);
	const running = useRef(false);
	const controller = useRef(new AbortController());

	const active = isRunActive(state.status);

	const handleEvent = useCallback(
		(event: EngineRuntimeEvent) => {
			setState((prev) => applyRuntimeEvent(prev, event));
			context.onEvent?.(event);
		},
		[context],
	);

	const handleOutput = useCallback((chunk: string, _source: OutputSource, jobName?: string) => {
		if (!jobName) {
			return;
		}
		setState((prev) => appendLogTail(prev, jobName, chunk));
	}, []);

	useEffect(() => {
		if (running.current) {
			return;
		}
		running.current = true;

		const outer = context.signal;
		const forwardAbort = (): void => controller.current.abort();
		if (outer?.aborted) {
			forwardAbort();
		}
		outer?.addEventListener("abort", forwardAbort);

		void adapter
			.run(plan, {
				...context,
				signal: controller.current.signal,
				onEvent: handleEvent,
				onOutput: handleOutput,
			})
			.then((result) => {
				onComplete(result);
			})
			.catch((error: unknown) => {
				exit(error instanceof Error ? error : new Error(String(error)));
			})
			.finally(() => {
				outer?.removeEventListener("abort", forwardAbort);
			});
	}, [adapter, context, exit, handleEvent, handleOutput, onComplete, plan]);

	useEffect(() => {
		const interval = setInterval(() => {
			setSpinnerIndex((prev) => (prev + 1) % SPINNER_FRAMES.length);
		}, SPINNER_INTERVAL_MS);
		return () => clearInterval(interval);
	}, []);

	const selectedJob = state.jobs[selectedJobIndex];
	const logLines = useMemo(
		() => (selectedJob ? (state.logTail[selectedJob.jobName] ?? []) : []),
		[selectedJob, state.logTail],
	);

	useInput((input, key) => {
		if (key.ctrl && input === "c") {
			if (active) {
				controller.current.abort();
			} else {
				exit();
			}
			return;
		}
		if (quitPromptVisible) {
			if (input === "y") {
				setQuitPromptVisible(false);
				controller.current.abort();
				return;
			}
			if (input === "n" || key.return || key.escape) {
				setQuitPromptVisible(false);
			}
			return;
		}
		if (input === "q") {
			if (active) {
				setQuitPromptVisible(true);
			} else {
				exit();
			}
			return;
		}
		if (key.tab || input === "\t") {
			setViewMode((prev) => (prev === "summary" ? "details" : "summary"));
			return;
		}
		if (input === "s") {
			setViewMode("summary");
			return;
		}
		if (input === "d") {
			setViewMode("details");
			return;
		}
		if (viewMode === "details" && key.upArrow) {
			setSelectedJobIndex((prev) => Math.max(0, prev - 1));
			return;
		}
		if (viewMode === "details" && key.downArrow) {
			setSelectedJobIndex((prev) => Math.min(state.jobs.length - 1, prev + 1));
		}
	});

	return (
		<Box flexDirection="column" padding={1}>
			<Box flexDirection="column" marginBottom={1}>
				<Text>
					{plan.pipeline ?? "jobs"} · {adapter.id} · {plan.runId}
				</Text>
				<Text color={colorForRunStatus(state.status)}>
					{RUN_STATUS_LABELS[state.status]}
					{state.exitCode !== undefined ? ` · exit ${state.exitCode}` : ""}
				</Text>
			</Box>

			{viewMode === "summary" ? (
				<SummaryPane jobs={state.jobs} spinnerIndex={spinnerIndex} />
			) : (
				<DetailsPane
					jobs={state.jobs}
					selectedIndex={selectedJobIndex}
					logLines={logLines}
					spinnerIndex={spinnerIndex}
				/>
			)}

			<Box marginTop={1}>
				<Text dimColor>{formatHelpText({ viewMode, quitPromptVisible, active })}</Text>
			</Box>
			{!active ? (
				<Box marginTop={1}>
					<Text dimColor>Run finished. Press q to exit.</Text>
				</Box>
			) : null}
		</Box>
	);
}
