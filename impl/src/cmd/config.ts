//-------------------------------------------------------------------------------------------------------
// Copyright (C) Microsoft. All rights reserved.
// Licensed under the MIT license. See LICENSE.txt file in the project root for full license information.
//-------------------------------------------------------------------------------------------------------

import { defaultVerifierOptions, isSolverKind, Logger, SolverKind, VerifierOptions } from "../tooling/verifier/verifier_options";

class ConfigError extends Error {
    readonly kind = "ConfigError";

    constructor(msg: string) {
        super(msg);
        this.name = "ConfigError";
    }
}

//command line values, all optional and still unparsed
type ConfigFlags = {
    solver?: string,
    z3?: string,
    timeout?: string,
    dumpDir?: string
};

function parseSolverKind(name: string, from: string): SolverKind {
    if (!isSolverKind(name)) {
        throw new ConfigError(`${from}: unknown solver "${name}" (expected z3 or wasm)`);
    }

    return name;
}

function parseTimeout(val: string, from: string): number {
    const timeout = Number(val);
    if (!Number.isSafeInteger(timeout) || timeout <= 0) {
        throw new ConfigError(`${from}: timeout must be a positive whole number of seconds, got "${val}"`);
    }

    return timeout;
}

/**
 * Defaults, then NETREACH_SOLVER / NETREACH_Z3 / NETREACH_DUMP_DIR from the environment, then the
 * command line flags.
 */
function resolveVerifierOptions(flags: ConfigFlags, env: NodeJS.ProcessEnv, logger?: Logger): VerifierOptions {
    let vopts = defaultVerifierOptions();
    if (logger !== undefined) {
        vopts.logger = logger;
    }

    const envsolver = env["NETREACH_SOLVER"];
    if (envsolver !== undefined && envsolver !== "") {
        vopts.solver = parseSolverKind(envsolver, "NETREACH_SOLVER");
    }

    const envz3 = env["NETREACH_Z3"];
    if (envz3 !== undefined && envz3 !== "") {
        vopts.z3path = envz3;
    }

    const envdump = env["NETREACH_DUMP_DIR"];
    if (envdump !== undefined && envdump !== "") {
        vopts.dumpDir = envdump;
    }

    if (flags.solver !== undefined) {
        vopts.solver = parseSolverKind(flags.solver, "--solver");
    }
    if (flags.z3 !== undefined) {
        vopts.z3path = flags.z3;
    }
    if (flags.timeout !== undefined) {
        vopts.timeout = parseTimeout(flags.timeout, "--timeout");
    }
    if (flags.dumpDir !== undefined) {
        vopts.dumpDir = flags.dumpDir;
    }

    return vopts;
}

export type { ConfigFlags };
export {
    ConfigError,
    resolveVerifierOptions
};
