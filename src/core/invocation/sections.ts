// CHANGE: Named, order-enforced sections for the compiler command line
// PURITY: CORE
// FORMAT THEOREM: tokens(plan) = concat(plan.sections[k] for k in SECTION_ORDER)
// INVARIANT: SECTION_ORDER lists every section exactly once (checked at compile time)
// COMPLEXITY: O(n) where n = total tokens

/**
 * Every section of a compiler invocation, by purpose.
 *
 * Relative order is fixed by SECTION_ORDER, never by the order in which
 * callers fill sections in.
 */
export interface InvocationSections {
	readonly executable: ReadonlyArray<string>;
	readonly moduleVisibility: ReadonlyArray<string>;
	readonly alternateFrontend: ReadonlyArray<string>;
	readonly launcherClasspath: ReadonlyArray<string>;
	readonly mainEntry: ReadonlyArray<string>;
	readonly classpathReference: ReadonlyArray<string>;
	readonly annotatedStdlib: ReadonlyArray<string>;
	readonly processorPath: ReadonlyArray<string>;
	readonly processorSelector: ReadonlyArray<string>;
	readonly processingMode: ReadonlyArray<string>;
	readonly extraArguments: ReadonlyArray<string>;
	readonly sourceReference: ReadonlyArray<string>;
}

export type SectionName = keyof InvocationSections;

/**
 * Assembly order. Module flags come first because the compiler frontend
 * parses them at startup; bootstrap overlays precede the processor path
 * because the checker discovers its classes through them.
 */
export const SECTION_ORDER = [
	"executable",
	"moduleVisibility",
	"alternateFrontend",
	"launcherClasspath",
	"mainEntry",
	"classpathReference",
	"annotatedStdlib",
	"processorPath",
	"processorSelector",
	"processingMode",
	"extraArguments",
	"sourceReference",
] as const satisfies ReadonlyArray<SectionName>;

// Fails to compile if a section is added to InvocationSections but not to SECTION_ORDER.
type MissingFromOrder = Exclude<SectionName, (typeof SECTION_ORDER)[number]>;
const orderIsComplete: [MissingFromOrder] extends [never] ? true : never = true;
void orderIsComplete;

export interface InvocationPlan {
	readonly sections: InvocationSections;
	readonly tokens: ReadonlyArray<string>;
}

const EMPTY_SECTIONS: InvocationSections = {
	executable: [],
	moduleVisibility: [],
	alternateFrontend: [],
	launcherClasspath: [],
	mainEntry: [],
	classpathReference: [],
	annotatedStdlib: [],
	processorPath: [],
	processorSelector: [],
	processingMode: [],
	extraArguments: [],
	sourceReference: [],
};

/**
 * Immutable builder: each `with` returns a new builder, `build` flattens
 * the sections in SECTION_ORDER.
 *
 * @example
 * ```ts
 * const plan = InvocationBuilder.start("javac")
 *   .with("sourceReference", ["@/tmp/src"])
 *   .with("processingMode", ["-proc:only"])
 *   .build();
 * // plan.tokens = ["javac", "-proc:only", "@/tmp/src"]
 * ```
 */
export class InvocationBuilder {
	private constructor(private readonly sections: InvocationSections) {}

	static start(executable: string): InvocationBuilder {
		return new InvocationBuilder({ ...EMPTY_SECTIONS, executable: [executable] });
	}

	with(name: Exclude<SectionName, "executable">, tokens: ReadonlyArray<string>): InvocationBuilder {
		return new InvocationBuilder({ ...this.sections, [name]: [...tokens] });
	}

	build(): InvocationPlan {
		const tokens = SECTION_ORDER.flatMap((name) => this.sections[name]);
		return { sections: this.sections, tokens };
	}
}
