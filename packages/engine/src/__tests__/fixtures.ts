export const SEGWIT = "bc1qar0srrr7xfkvy5l643lydnw9re59gtzzwf5mdq";
export const TAPROOT = "bc1p5d7rjq7g6rdk2yhzks9smlaqtedr4dekq08ge8ztwac72sfr9rusxg3297";
export const LEGACY = "1BoatSLRHtKNngkdXEeobR76b53LETtpyT";
export const P2SH = "3J98t1WpEZ73CNmQviecrnyiWrnqRhWNLy";
export const TESTNET_SEGWIT = "tb1qw508d6qejxtdg4y5r3zarvary0c5xw7kxpjzsx";
export const TESTNET_LEGACY = "mipcBbFg9gMiCh81Kj8tqqdgoZub1ZJRfn";

export const TXID_A = "a".repeat(64);
export const TXID_B = "b1".repeat(32);
