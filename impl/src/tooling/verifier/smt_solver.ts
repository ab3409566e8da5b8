//-------------------------------------------------------------------------------------------------------
// Copyright (C) Microsoft. All rights reserved.
// Licensed under the MIT license. See LICENSE.txt file in the project root for full license information.
//-------------------------------------------------------------------------------------------------------

import { execFile } from "child_process";

import { init } from "z3-solver";
import type { Context } from "z3-solver";

import { SMTAssembly } from "./smt_assembly";
import { SolverError } from "./verifier_errors";

type SolverVerdict = "sat" | "unsat";

interface SMTSolver {
    readonly name: string;

    checkSat(asm: SMTAssembly): Promise<SolverVerdict>;
}

function parseVerdict(solver: string, output: string): SolverVerdict {
    const first = output.trim().split(/\r?\n/)[0] ?? "";
    if (first === "sat" || first === "unsat") {
        return first;
    }

    throw new SolverError(`${solver} did not give a verdict -- ${first === "" ? "no output" : first}`, output);
}

/**
 * z3 run as a child process, the program goes in on stdin. `-T` bounds the run in whole seconds.
 */
class Z3ProcessSolver implements SMTSolver {
    readonly name = "z3";
    readonly z3path: string;
    readonly timeout: number;

    constructor(z3path: string, timeout: number) {
        this.z3path = z3path;
        this.timeout = timeout;
    }

    checkSat(asm: SMTAssembly): Promise<SolverVerdict> {
        return new Promise<SolverVerdict>((resolve, reject) => {
            try {
                const smtcall = asm.buildSMT2file(true);

                const proc = execFile(this.z3path, ["-smt2", `-T:${this.timeout}`, "-in"], (err, stdout, stderr) => {
                    const output = `${stdout}`;
                    if (err !== null && !/^(sat|unsat)\b/.test(output.trim())) {
                        reject(new SolverError(`${this.z3path} failed -- ${err.message}`, output + `${stderr}`));
                        return;
                    }

                    try {
                        resolve(parseVerdict(this.name, output));
                    }
                    catch (ex) {
                        reject(ex);
                    }
                });

                if (proc.stdin === null) {
                    reject(new SolverError(`${this.z3path} has no stdin`, ""));
                    return;
                }

                //a solver that never started closes its stdin under us
                proc.stdin.on("error", (err) => {
                    reject(new SolverError(`${this.z3path} did not take the program -- ${err.message}`, ""));
                });

                proc.stdin.setDefaultEncoding("utf-8");
                proc.stdin.write(smtcall);
                proc.stdin.write("\n");
                proc.stdin.end();
            }
            catch (ex) {
                reject(new SolverError(`${this.z3path} could not be started -- ${ex}`, ""));
            }
        });
    }
}

type Z3Api = Awaited<ReturnType<typeof init>>;

/**
 * z3 compiled to WebAssembly (the z3-solver package), in process. The module is loaded once and
 * shared; each check gets its own Solver.
 */
class Z3WasmSolver implements SMTSolver {
    readonly name = "z3-wasm";
    readonly timeout: number;

    private static api: Promise<Z3Api> | undefined = undefined;
    private static ctx: Context<"main"> | undefined = undefined;

    constructor(timeout: number) {
        this.timeout = timeout;
    }

    private static async loadContext(): Promise<Context<"main">> {
        if (Z3WasmSolver.api === undefined) {
            Z3WasmSolver.api = init();
        }

        const api = await Z3WasmSolver.api;
        if (Z3WasmSolver.ctx === undefined) {
            Z3WasmSolver.ctx = api.Context("main");
        }

        return Z3WasmSolver.ctx;
    }

    //stops the worker threads of the wasm module, nothing can be checked afterwards
    static async shutdown(): Promise<void> {
        if (Z3WasmSolver.api !== undefined) {
            const api = await Z3WasmSolver.api;
            api.em.PThread.terminateAllThreads();

            Z3WasmSolver.api = undefined;
            Z3WasmSolver.ctx = undefined;
        }
    }

    async checkSat(asm: SMTAssembly): Promise<SolverVerdict> {
        const ctx = await Z3WasmSolver.loadContext();

        const solver = new ctx.Solver();
        solver.set("timeout", this.timeout * 1000);

        try {
            solver.fromString(asm.buildSMT2file(false));
        }
        catch (ex) {
            throw new SolverError(`${this.name} rejected the program -- ${ex}`, "");
        }

        const res = await solver.check();
        if (res === "unknown") {
            throw new SolverError(`${this.name} did not give a verdict -- unknown (timeout ${this.timeout}s)`, res);
        }

        return res;
    }
}

export type { SolverVerdict, SMTSolver };
export {
    parseVerdict,
    Z3ProcessSolver, Z3WasmSolver
};
