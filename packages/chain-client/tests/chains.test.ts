import { describe, it, expect } from "vitest";
import { base, foundry } from "viem/chains";
import {
  evmChainNumber,
  getChainRef,
  isEvmChain,
  supportedChainIds,
  viemChainFor,
} from "../src/chains.js";

describe("getChainRef", () => {
  it("builds a reference from the viem chain", () => {
    expect(getChainRef("eip155:8453")).toEqual({
      chainId: "eip155:8453",
      name: base.name,
      family: "evm",
    });
  });

  it("returns undefined for an unknown chain", () => {
    expect(getChainRef("eip155:999999")).toBeUndefined();
  });
});

describe("viemChainFor", () => {
  it("maps the local devnet id to foundry", () => {
    expect(viemChainFor("eip155:31337")).toBe(foundry);
  });

  it("lists every supported id once", () => {
    const ids = supportedChainIds();
    expect(ids).toHaveLength(8);
    expect(new Set(ids).size).toBe(8);
    expect(ids).toContain("eip155:11155111");
  });
});

describe("isEvmChain", () => {
  it("recognizes eip155 ids", () => {
    expect(isEvmChain("eip155:11155111")).toBe(true);
    expect(isEvmChain("xrpl:main")).toBe(false);
  });
});

describe("evmChainNumber", () => {
  it("extracts the numeric id", () => {
    expect(evmChainNumber("eip155:1")).toBe(1);
    expect(evmChainNumber("eip155:31337")).toBe(31337);
  });

  it("throws for a malformed id", () => {
    expect(() => evmChainNumber("eip155:")).toThrow("Not an EVM chain id");
    expect(() => evmChainNumber("solana:mainnet")).toThrow("Not an EVM chain id");
  });
});
