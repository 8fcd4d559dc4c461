import { describe, it, expect } from "vitest";
import { Decimal } from "decimal.js";
import { CollaboratorError } from "@hodlchat/core";
import { DemoPriceService, DemoWallet, createDemoCollaborators } from "../demo-wallet.js";

const DESTINATION = "1BoatSLRHtKNngkdXEeobR76b53LETtpyT";
const SIGNAL = new AbortController().signal;

describe("DemoWallet", () => {
  it("moves the balance and records the send", async () => {
    const wallet = new DemoWallet({ now: 1_700_000_000_000 });
    const result = await wallet.broadcast({ destination: DESTINATION, amountSats: 1_000_000, feeRate: 20 }, SIGNAL);

    expect(result.ok).toBe(true);
    const snapshot = wallet.getSnapshot();
    expect(snapshot.balance.toString()).toBe("0.037872");
    expect(snapshot.transactions[0]).toMatchObject({ direction: "sent", confirmations: 0, address: DESTINATION });
    expect(snapshot.transactions[0].amount.toString()).toBe("0.01");
    expect(snapshot.transactions).toHaveLength(3);
  });

  it("refuses a send larger than the balance plus fee", async () => {
    const wallet = new DemoWallet();
    const result = await wallet.broadcast({ destination: DESTINATION, amountSats: 5_000_000, feeRate: 20 }, SIGNAL);
    expect(result).toEqual({ ok: false, error: { kind: "insufficientFunds", message: "needs 0.050028 BTC" } });
    expect(wallet.getSnapshot().balance.toString()).toBe("0.0479");
  });

  it("derives the same txid for the same sequence of sends", async () => {
    const request = { destination: DESTINATION, amountSats: 10_000, feeRate: 8 };
    const a = await new DemoWallet().broadcast(request, SIGNAL);
    const b = await new DemoWallet().broadcast(request, SIGNAL);
    expect(a).toEqual(b);
    expect(a.ok && a.txid).toMatch(/^[0-9a-f]{64}$/);
  });

  it("rotates receive addresses", () => {
    const wallet = new DemoWallet({ receiveAddresses: ["addr-0", "addr-1"] });
    expect(wallet.getSnapshot().receiveAddress).toBe("addr-0");
    expect(wallet.nextAddress()).toBe("addr-1");
    expect(wallet.getSnapshot().receiveAddress).toBe("addr-1");
    expect(wallet.nextAddress()).toBe("addr-0");
  });

  it("uses the custom balance it is given", () => {
    expect(new DemoWallet({ balance: new Decimal(2) }).getSnapshot().balance.toString()).toBe("2");
  });
});

describe("DemoPriceService", () => {
  it("quotes known currencies case-insensitively", async () => {
    const prices = new DemoPriceService({ USD: 50_000 });
    expect((await prices.getPrice("usd", SIGNAL)).toString()).toBe("50000");
  });

  it("rejects unknown currencies", async () => {
    await expect(new DemoPriceService().getPrice("XYZ", SIGNAL)).rejects.toBeInstanceOf(CollaboratorError);
  });
});

describe("createDemoCollaborators", () => {
  it("wires one wallet behind every collaborator", async () => {
    const collaborators = createDemoCollaborators();
    expect(collaborators.broadcaster).toBe(collaborators.wallet);
    expect(await collaborators.fees?.getFeeEstimates(SIGNAL)).toEqual({ slow: 8, medium: 20, fast: 40 });
  });
});
