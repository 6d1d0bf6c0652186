#!/usr/bin/env node
import fs from "fs";
import readline from "readline/promises";
import { Command, InvalidArgumentError, Option } from "commander";
import dotenv from "dotenv";
import PorscheConnect from "../index";
import Vehicle from "../Vehicle";
import { CaptchaRequiredError, PorscheError } from "../errors";
import { PorscheConnectConfig } from "../types";
import { CliConfig, loadCliConfig } from "./config";
import { VehicleCommandOptions, vehicleCommands } from "./commands";

export const CAPTCHA_FILE = "captcha.svg";

export interface CliDeps {
  createClient(config: PorscheConnectConfig): PorscheConnect;
  loadConfig(): CliConfig;
  prompt(question: string): Promise<string>;
  write(text: string): void;
  writeFile(file: string, data: Buffer): void;
}

interface GlobalOptions {
  debug?: boolean;
  email?: string;
  password?: string;
  sessionfile?: string;
  nowait?: boolean;
}

interface VehicleSelection extends VehicleCommandOptions {
  vin?: string;
  all?: boolean;
}

function parseInteger(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (Number.isNaN(parsed)) {
    throw new InvalidArgumentError("Not a number.");
  }
  return parsed;
}

function parseNumber(value: string): number {
  const parsed = Number.parseFloat(value);
  if (Number.isNaN(parsed)) {
    throw new InvalidArgumentError("Not a number.");
  }
  return parsed;
}

function parseBoolean(value: string): boolean {
  const normalized = value.toLowerCase();
  if (["true", "1", "yes", "on"].includes(normalized)) return true;
  if (["false", "0", "no", "off"].includes(normalized)) return false;
  throw new InvalidArgumentError("Expected true or false.");
}

/** Decodes the `data:` URL the identity server embeds the captcha image in. */
export function decodeCaptchaImage(captcha: string): Buffer {
  const match = /^data:[^,]*?(;base64)?,(.*)$/s.exec(captcha);
  if (!match) {
    return Buffer.from(captcha, "utf-8");
  }
  return match[1]
    ? Buffer.from(match[2], "base64")
    : Buffer.from(decodeURIComponent(match[2]), "utf-8");
}

export function buildProgram(deps: CliDeps): Command {
  const program = new Command();

  program
    .name("porsche-connect")
    .description("Porsche Connect CLI")
    .option("-d, --debug", "Log requests and authentication steps")
    .option("-e, --email <email>", "Porsche ID e-mail address")
    .option("-p, --password <password>", "Porsche ID password")
    .option("-s, --sessionfile <path>", "File the session token is cached in")
    .option("--nowait", "Return as soon as a remote command is accepted");

  const createClient = async (options: GlobalOptions) => {
    const config = deps.loadConfig();
    const email =
      options.email ??
      config.email ??
      (await deps.prompt("Please enter Porsche Connect email: "));
    const password =
      options.password ??
      config.password ??
      (await deps.prompt("Password: "));

    return deps.createClient({
      email,
      password,
      sessionFile: options.sessionfile ?? config.sessionFile,
      checkRequestStatus: !options.nowait,
      debug: options.debug ?? false,
    });
  };

  // A captcha challenge is answered once, then the action runs again
  const withCaptcha = async <T>(
    client: PorscheConnect,
    action: () => Promise<T>,
  ): Promise<T> => {
    try {
      return await action();
    } catch (error) {
      if (!(error instanceof CaptchaRequiredError)) {
        throw error;
      }
      deps.writeFile(CAPTCHA_FILE, decodeCaptchaImage(error.captcha));
      const code = await deps.prompt(
        `Captcha required, see ${CAPTCHA_FILE}. Enter the captcha code: `,
      );
      client.setCaptcha({
        code,
        state: error.state,
        codeVerifier: error.codeVerifier,
      });
      return action();
    }
  };

  const output = (value: unknown) => {
    deps.write(JSON.stringify(value ?? null, null, 2));
  };

  program
    .command("list")
    .description("List the vehicles of the account")
    .action(async (_options: unknown, command: Command) => {
      const client = await createClient(command.optsWithGlobals<GlobalOptions>());
      const vehicles = await withCaptcha(client, () => client.getVehicles());
      output(vehicles.map((vehicle) => vehicle.getData()));
    });

  program
    .command("token")
    .description("Print the current access token")
    .action(async (_options: unknown, command: Command) => {
      const client = await createClient(command.optsWithGlobals<GlobalOptions>());
      output(await withCaptcha(client, () => client.getToken()));
    });

  for (const [name, vehicleCommand] of Object.entries(vehicleCommands)) {
    const sub = program
      .command(name)
      .description(vehicleCommand.description)
      .addOption(new Option("-v, --vin <vin>", "Vehicle VIN").conflicts("all"))
      .addOption(new Option("-a, --all", "Run for every vehicle"));

    if (name === "unlock_vehicle") {
      sub.requiredOption("-n, --pin <pin>", "Vehicle PIN");
    }
    if (name === "chargingprofile") {
      sub
        .option("--profileid <id>", "Profile id", parseInteger)
        .option("--chargelevel <level>", "Minimum charge level", parseInteger)
        .option("--profileactive <active>", "Profile active status", parseBoolean);
    }
    if (name === "climatise_on") {
      sub.option(
        "--temperature <celsius>",
        "Target temperature in Celsius",
        parseNumber,
      );
    }

    sub.action(async (_options: unknown, command: Command) => {
      const options = command.optsWithGlobals<GlobalOptions & VehicleSelection>();
      if (!options.vin && !options.all) {
        command.error("error: --vin or --all is required");
      }

      const client = await createClient(options);

      if (options.vin) {
        const vin = options.vin;
        const vehicle = await withCaptcha(client, () => client.getVehicle(vin));
        if (!vehicle) {
          throw new PorscheError(`Vehicle ${vin} not found`);
        }
        output(await vehicleCommand.run(vehicle, options));
        return;
      }

      const vehicles: Vehicle[] = await withCaptcha(client, () =>
        client.getVehicles(),
      );
      const results: Record<string, unknown> = {};
      for (const vehicle of vehicles) {
        results[vehicle.vin] = await vehicleCommand.run(vehicle, options);
      }
      output(results);
    });
  }

  return program;
}

async function prompt(question: string): Promise<string> {
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  });
  try {
    return (await rl.question(question)).trim();
  } finally {
    rl.close();
  }
}

export const defaultDeps: CliDeps = {
  createClient: (config) => PorscheConnect.create(config),
  loadConfig: () => loadCliConfig(),
  prompt,
  write: (text) => {
    process.stdout.write(`${text}\n`);
  },
  writeFile: (file, data) => {
    fs.writeFileSync(file, data);
  },
};

export async function main(
  argv: string[] = process.argv,
  deps: CliDeps = defaultDeps,
): Promise<void> {
  dotenv.config();

  try {
    await buildProgram(deps).parseAsync(argv);
  } catch (error) {
    if (error instanceof PorscheError) {
      console.error(error.reason);
      process.exitCode = 1;
      return;
    }
    throw error;
  }
}

if (require.main === module) {
  main().catch((error) => {
    console.error(error);
    process.exitCode = 1;
  });
}
