import { deepEqual, instance, mock, verify, when } from "ts-mockito";

import PorscheConnect from "../../../src/index";
import RequestService from "../../../src/RequestService";
import Vehicle from "../../../src/Vehicle";
import { buildProgram, CliDeps, decodeCaptchaImage, main } from "../../../src/cli";
import { CaptchaRequiredError, WrongCredentialsError } from "../../../src/errors";
import { CommandResponseStatus } from "../../../src/types";
import {
  authToken,
  storedOverview,
  testVin,
  vehicleSummary,
} from "../testData";

describe("cli", () => {
  let client: PorscheConnect;
  let requestService: RequestService;
  let vehicle: Vehicle;
  let writes: string[];
  let createClient: jest.Mock;
  let prompt: jest.Mock;
  let writeFile: jest.Mock;
  let deps: CliDeps;

  const silent = { writeOut: () => undefined, writeErr: () => undefined };

  const run = (...args: string[]) => {
    const program = buildProgram(deps).exitOverride().configureOutput(silent);
    program.commands.forEach((command) =>
      command.exitOverride().configureOutput(silent),
    );
    return program.parseAsync(["node", "porsche-connect", ...args]);
  };

  const credentials = ["-e", "driver@example.com", "-p", "test-password"];

  beforeEach(() => {
    requestService = mock(RequestService);
    when(requestService.getStoredOverview(testVin)).thenResolve(storedOverview());
    when(requestService.sendCommand(testVin, "LOCK", deepEqual({}))).thenResolve({
      status: CommandResponseStatus.success,
    });
    vehicle = new Vehicle(instance(requestService), vehicleSummary, storedOverview());

    client = mock(PorscheConnect);
    when(client.getVehicles()).thenResolve([vehicle]);
    when(client.getVehicle(testVin)).thenResolve(vehicle);
    when(client.getToken()).thenResolve(authToken);

    writes = [];
    createClient = jest.fn().mockReturnValue(instance(client));
    prompt = jest.fn();
    writeFile = jest.fn();
    deps = {
      createClient,
      loadConfig: () => ({ sessionFile: ".session" }),
      prompt,
      write: (text) => {
        writes.push(text);
      },
      writeFile,
    };
  });

  afterEach(() => {
    process.exitCode = undefined;
    jest.restoreAllMocks();
  });

  test("list prints the data of every vehicle", async () => {
    await run(...credentials, "list");

    expect(JSON.parse(writes[0])).toEqual([vehicle.getData()]);
  });

  test("token prints the session token", async () => {
    await run(...credentials, "token");

    expect(JSON.parse(writes[0])).toEqual(authToken);
  });

  test("battery for one vehicle", async () => {
    await run(...credentials, "battery", "-v", testVin);

    expect(writes).toEqual(["76"]);
  });

  test("lock_vehicle for all vehicles is keyed by VIN", async () => {
    await run(...credentials, "lock_vehicle", "--all");

    expect(JSON.parse(writes[0])).toEqual({ [testVin]: "success" });
  });

  test("passes flags to the client", async () => {
    await run(...credentials, "-s", "/tmp/porsche.json", "--nowait", "-d", "token");

    expect(createClient).toHaveBeenCalledWith({
      email: "driver@example.com",
      password: "test-password",
      sessionFile: "/tmp/porsche.json",
      checkRequestStatus: false,
      debug: true,
    });
  });

  test("falls back to the config file, then prompts", async () => {
    deps.loadConfig = () => ({
      email: "config@example.com",
      sessionFile: "config-session.json",
    });
    prompt.mockResolvedValueOnce("prompted-password");

    await run("token");

    expect(prompt).toHaveBeenCalledTimes(1);
    expect(createClient).toHaveBeenCalledWith({
      email: "config@example.com",
      password: "prompted-password",
      sessionFile: "config-session.json",
      checkRequestStatus: true,
      debug: false,
    });
  });

  test("vehicle commands need --vin or --all", async () => {
    await expect(run(...credentials, "battery")).rejects.toThrow(
      "--vin or --all is required",
    );
    expect(createClient).not.toHaveBeenCalled();
  });

  test("--vin and --all conflict", async () => {
    await expect(
      run(...credentials, "battery", "-v", testVin, "-a"),
    ).rejects.toMatchObject({ code: "commander.conflictingOption" });
  });

  test("unlock_vehicle needs a PIN", async () => {
    await expect(
      run(...credentials, "unlock_vehicle", "-v", testVin),
    ).rejects.toMatchObject({ code: "commander.missingMandatoryOptionValue" });
  });

  test("answers a captcha and retries", async () => {
    when(client.getVehicle(testVin))
      .thenReject(
        new CaptchaRequiredError(
          "data:image/svg+xml;base64,PHN2Zz48L3N2Zz4=",
          "auth0-state",
          "test-verifier",
        ),
      )
      .thenResolve(vehicle);
    prompt.mockResolvedValueOnce("k7x2");

    await run(...credentials, "battery", "-v", testVin);

    expect(writeFile).toHaveBeenCalledWith(
      "captcha.svg",
      Buffer.from("<svg></svg>"),
    );
    verify(
      client.setCaptcha(
        deepEqual({
          code: "k7x2",
          state: "auth0-state",
          codeVerifier: "test-verifier",
        }),
      ),
    ).once();
    expect(writes).toEqual(["76"]);
  });

  test("decodes a URL-encoded captcha", () => {
    expect(
      decodeCaptchaImage("data:image/svg+xml;utf8,%3Csvg%3E%3C%2Fsvg%3E").toString(),
    ).toEqual("<svg></svg>");
  });

  test("main reports wrong credentials", async () => {
    const error = jest.spyOn(console, "error").mockImplementation(() => undefined);
    when(client.getVehicles()).thenReject(new WrongCredentialsError());

    await main(["node", "porsche-connect", ...credentials, "list"], deps);

    expect(error).toHaveBeenCalledWith("Wrong credentials");
    expect(process.exitCode).toEqual(1);
  });

  test("main reports an unknown vehicle", async () => {
    const error = jest.spyOn(console, "error").mockImplementation(() => undefined);
    when(client.getVehicle("WP0ZZZ00000000000")).thenResolve(undefined);

    await main(
      ["node", "porsche-connect", ...credentials, "battery", "-v", "WP0ZZZ00000000000"],
      deps,
    );

    expect(error).toHaveBeenCalledWith("Vehicle WP0ZZZ00000000000 not found");
    expect(process.exitCode).toEqual(1);
  });
});
