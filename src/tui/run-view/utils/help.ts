export type RunViewMode = "summary" | "details";

export type HelpTextInput = {
	viewMode: RunViewMode;
	quitPromptVisible: boolean;
	active: boolean;
};

export function formatHelpText({ viewMode, quitPromptVisible, active }: HelpTextInput): string {
	if (quitPromptVisible) {
		return "Y: abort run · N/Enter/Esc: continue run";
	}
	const quit = active ? "Q: abort" : "Q: exit";
	if (viewMode === "summary") {
		return `Tab: switch view · D: details · ${quit}`;
	}
	return `Up/Down: select job · Tab: switch view · S: summary · ${quit}`;
}
