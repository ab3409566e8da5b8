//-------------------------------------------------------------------------------------------------------
// Copyright (C) Microsoft. All rights reserved.
// Licensed under the MIT license. See LICENSE.txt file in the project root for full license information.
//-------------------------------------------------------------------------------------------------------

import * as OS from "os";

import chalk from "chalk";

import { SMTSolver, Z3ProcessSolver, Z3WasmSolver } from "./smt_solver";

type SolverKind = "z3" | "wasm";

interface Logger {
    info(msg: string): void;
    error(msg: string): void;
}

const consoleLogger: Logger = {
    info: (msg: string) => {
        process.stdout.write(chalk.blue(msg + "\n"));
    },
    error: (msg: string) => {
        process.stderr.write(chalk.red(msg + "\n"));
    }
};

//collects lines instead of printing them
class BufferLogger implements Logger {
    readonly lines: string[] = [];

    info(msg: string): void {
        this.lines.push(msg);
    }

    error(msg: string): void {
        this.lines.push(msg);
    }
}

type VerifierOptions = {
    solver: SolverKind,
    z3path: string,
    timeout: number, //seconds
    dumpDir: string,
    logger: Logger
};

function isSolverKind(name: string): name is SolverKind {
    return name === "z3" || name === "wasm";
}

function defaultVerifierOptions(): VerifierOptions {
    return {
        solver: "z3",
        z3path: "z3",
        timeout: 10,
        dumpDir: OS.tmpdir(),
        logger: consoleLogger
    };
}

function createSolver(vopts: VerifierOptions): SMTSolver {
    switch (vopts.solver) {
        case "z3":
            return new Z3ProcessSolver(vopts.z3path, vopts.timeout);
        case "wasm":
            return new Z3WasmSolver(vopts.timeout);
    }
}

export type { SolverKind, Logger, VerifierOptions };
export {
    consoleLogger, BufferLogger,
    isSolverKind, defaultVerifierOptions, createSolver
};
