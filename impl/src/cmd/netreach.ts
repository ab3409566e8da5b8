#!/usr/bin/env node

//-------------------------------------------------------------------------------------------------------
// Copyright (C) Microsoft. All rights reserved.
// Licensed under the MIT license. See LICENSE.txt file in the project root for full license information.
//-------------------------------------------------------------------------------------------------------

import * as Commander from "commander";
import chalk from "chalk";

import { ConfigFlags, resolveVerifierOptions } from "./config";
import { processCheckAction, processEmitAction } from "./process_check";
import { Z3WasmSolver } from "../tooling/verifier/smt_solver";

type CheckFlags = ConfigFlags & { emit?: string };

function reportAndExit(ex: unknown): never {
    process.stderr.write(chalk.red(`${ex instanceof Error ? ex.message : ex}\n`));
    process.exit(1);
}

const program = new Commander.Command();

program
    .name("netreach")
    .description("Bounded reachability checks for forwarding policies");

program
    .command("check")
    .description("Run every check of a suite against the solver and compare with its expected verdict")
    .argument("<suite>", "JSON file with the checks")
    .option("-s --solver <solver>", "z3 (external process) or wasm (in process)")
    .option("--z3 <path>", "z3 executable for the process solver")
    .option("-t --timeout <seconds>", "Solver timeout per check")
    .option("-d --dump-dir <dir>", "Where programs of mismatching checks are written")
    .option("-e --emit <dir>", "Also write every check's SMT program to this directory")
    .action(async (suite: string, flags: CheckFlags) => {
        try {
            const vopts = resolveVerifierOptions(flags, process.env);
            const code = await processCheckAction(suite, vopts, flags.emit);

            if (vopts.solver === "wasm") {
                await Z3WasmSolver.shutdown();
            }
            process.exit(code);
        }
        catch (ex) {
            reportAndExit(ex);
        }
    });

program
    .command("emit")
    .description("Write the SMT program of every check without solving")
    .argument("<suite>", "JSON file with the checks")
    .requiredOption("-o --out <dir>", "Output directory")
    .action((suite: string, flags: { out: string }) => {
        try {
            process.exit(processEmitAction(suite, flags.out));
        }
        catch (ex) {
            reportAndExit(ex);
        }
    });

program.parseAsync(process.argv).catch(reportAndExit);
