//-------------------------------------------------------------------------------------------------------
// Copyright (C) Microsoft. All rights reserved.
// Licensed under the MIT license. See LICENSE.txt file in the project root for full license information.
//-------------------------------------------------------------------------------------------------------

import * as FS from "fs";
import * as Path from "path";

import chalk from "chalk";

import { CheckCase, loadSuite } from "./suite_load";
import { SMTAssembly } from "../tooling/verifier/smt_assembly";
import { checkReachabilityK, hopBound, verifyProgram } from "../tooling/verifier/smt_workflows";
import { VerificationContext } from "../tooling/verifier/verification_context";
import { VerifierOptions } from "../tooling/verifier/verifier_options";
import { Result, ShapeError } from "../tooling/verifier/verifier_errors";

type CheckResults = {
    passed: string[],
    failed: string[],
    errors: string[]
};

//names that clean to a file already taken get -1, -2, ... appended
function emitFileName(name: string, used: Set<string> = new Set<string>()): string {
    const base = name.replace(/[^A-Za-z0-9_.-]/g, "_");

    let file = `${base}.smt2`;
    for (let i = 1; used.has(file); ++i) {
        file = `${base}-${i}.smt2`;
    }
    used.add(file);

    return file;
}

function buildCheckAssembly(cc: CheckCase): Result<SMTAssembly, ShapeError> {
    const k = cc.k ?? hopBound(cc.program);
    return verifyProgram(new VerificationContext(), cc.entry, cc.program, cc.exit, [], k);
}

//the SMT program of every check goes to <outdir>/<name>.smt2, nothing is solved
function emitChecks(cases: CheckCase[], outdir: string, write: (msg: string) => void): number {
    FS.mkdirSync(outdir, { recursive: true });

    let failures = 0;
    let used = new Set<string>();
    cases.forEach((cc) => {
        const ares = buildCheckAssembly(cc);
        if (!ares.ok) {
            write(chalk.red(`error ${cc.name} -- ${ares.error.message}\n`));
            failures++;
            return;
        }

        const file = Path.join(outdir, emitFileName(cc.name, used));
        FS.writeFileSync(file, ares.value.buildSMT2file(true));
        write(`wrote ${chalk.bold(cc.name)} to ${file}\n`);
    });

    return failures;
}

async function runChecks(cases: CheckCase[], vopts: VerifierOptions, write: (msg: string) => void): Promise<CheckResults> {
    let results: CheckResults = { passed: [], failed: [], errors: [] };

    //one at a time, the solver is the expensive part and the wasm build is single instance
    for (let i = 0; i < cases.length; ++i) {
        const cc = cases[i];
        const k = cc.k ?? hopBound(cc.program);

        try {
            const ok = await checkReachabilityK(k, cc.name, cc.entry, cc.program, cc.exit, [], cc.oracle, vopts);
            if (ok) {
                write(`${chalk.bold(cc.name)} (k=${k}) ${chalk.green("pass")}\n`);
                results.passed.push(cc.name);
            }
            else {
                write(`${chalk.bold(cc.name)} (k=${k}) ${chalk.red("fail")}\n`);
                results.failed.push(cc.name);
            }
        }
        catch (ex) {
            const msg = ex instanceof Error ? ex.message : `${ex}`;
            write(`${chalk.bold(cc.name)} ${chalk.magenta("error")} -- ${msg}\n`);
            results.errors.push(cc.name);
        }
    }

    return results;
}

async function processCheckAction(suitefile: string, vopts: VerifierOptions, emitdir: string | undefined): Promise<number> {
    const write = (msg: string) => process.stdout.write(msg);

    const cases = loadSuite(Path.resolve(suitefile));
    if (emitdir !== undefined) {
        emitChecks(cases, Path.resolve(emitdir), write);
    }

    const results = await runChecks(cases, vopts, write);

    process.stdout.write(`Completed ${cases.length} checks...\n`);
    if (results.failed.length === 0 && results.errors.length === 0) {
        process.stdout.write(chalk.bold(`${results.passed.length}`) + " " + chalk.green("ok") + "\n");
        return 0;
    }
    else {
        process.stdout.write(chalk.bold(`${results.failed.length}`) + " " + chalk.red("failures") + "\n");
        process.stdout.write(chalk.bold(`${results.errors.length}`) + " " + chalk.magenta("errors") + "\n");
        return 1;
    }
}

function processEmitAction(suitefile: string, outdir: string): number {
    const cases = loadSuite(Path.resolve(suitefile));
    const failures = emitChecks(cases, Path.resolve(outdir), (msg: string) => process.stdout.write(msg));

    return failures === 0 ? 0 : 1;
}

export type { CheckResults };
export {
    emitFileName, buildCheckAssembly, emitChecks, runChecks,
    processCheckAction, processEmitAction
};
