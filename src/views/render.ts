import { readFileSync } from "node:fs";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import Handlebars from "handlebars";
import type { CoopStatistics, LatestGame, MostPlayedGame } from "../types.js";

export const DEFAULT_TEMPLATE_DIR = fileURLToPath(new URL("../../templates/", import.meta.url));

const TEMPLATE_NAMES = ["game_list", "statistics", "full_statistics", "error"] as const;

type TemplateName = (typeof TEMPLATE_NAMES)[number];

export interface FullStatisticsView {
	name: string;
	games: LatestGame[];
}

export interface StatisticsView {
	coops: CoopStatistics;
	mostPlayed: MostPlayedGame | null;
}

/**
 * Compiled page templates. Values are HTML-escaped by Handlebars.
 */
export class Views {
	private templates: Map<TemplateName, Handlebars.TemplateDelegate>;

	private constructor(templates: Map<TemplateName, Handlebars.TemplateDelegate>) {
		this.templates = templates;
	}

	/**
	 * Read and compile every template in `dir`. Throws when one is missing.
	 */
	static load(dir: string = DEFAULT_TEMPLATE_DIR): Views {
		const env = Handlebars.create();
		const templates = new Map<TemplateName, Handlebars.TemplateDelegate>();

		for (const name of TEMPLATE_NAMES) {
			const source = readFileSync(join(dir, `${name}.hbs`), "utf-8");
			env.registerPartial(name, source);
			templates.set(name, env.compile(source));
		}

		return new Views(templates);
	}

	gameList(games: LatestGame[]): string {
		return this.render("game_list", { games });
	}

	statistics(view: StatisticsView): string {
		return this.render("statistics", view);
	}

	fullStatistics(view: FullStatisticsView): string {
		return this.render("full_statistics", view);
	}

	error(status: number, message: string): string {
		return this.render("error", { status, message });
	}

	private render(name: TemplateName, context: object): string {
		const template = this.templates.get(name);
		if (!template) {
			throw new Error(`Template not loaded: ${name}`);
		}
		return template(context);
	}
}
