export type SuiteDefinition = {
    nxTarget: string;
    allureResultsPath: string;
};

export type ResolvedSuite = SuiteDefinition & {
    name: string;
    known: boolean;
};

export type SuiteOverrides = {
    nxTarget?: string | null;
    allureResultsPath?: string | null;
};

export const SUITES: Readonly<Record<string, SuiteDefinition>> = {
    chat: {
        nxTarget: "chat-e2e:e2e:chat",
        allureResultsPath: "./apps/chat-e2e/allure-chat-results",
    },
    overlay: {
        nxTarget: "chat-e2e:e2e:overlay",
        allureResultsPath: "./apps/chat-e2e/allure-overlay-results",
    },
};

// Unknown names are treated as an Nx target of their own.
const fallbackSuite = (name: string): SuiteDefinition => ({
    nxTarget: name,
    allureResultsPath: `./apps/chat-e2e/allure-${name}-results`,
});

export const resolveSuite = (name: string, overrides: SuiteOverrides = {}): ResolvedSuite => {
    const known = Object.hasOwn(SUITES, name);
    const definition = known ? SUITES[name] : fallbackSuite(name);
    return {
        name,
        known,
        nxTarget: overrides.nxTarget || definition.nxTarget,
        allureResultsPath: overrides.allureResultsPath || definition.allureResultsPath,
    };
};
