/**
 * Shared header fixtures.
 *
 * GENESIS_HEADER is the serialized main-network genesis block header.
 * HIGH_HASH_HEADER is the same header with version 2; its hash no longer
 * meets the declared target.
 */

export const GENESIS_HEADER =
  "01000000" +
  "0000000000000000000000000000000000000000000000000000000000000000" +
  "3ba3edfd7a7b12b27ac72c3e67768f617fc81bc3888a51323a9fb8aa4b1e5e4a" +
  "29ab5f49" +
  "ffff001d" +
  "1dac2b7c";

export const GENESIS_HASH256 =
  "6fe28c0ab6f1b372c1a6a246ae63f74f931e8365e15a089c68d6190000000000";

export const GENESIS_BLOCK_ID =
  "000000000019d6689c085ae165831e934ff763ae46a2a6c172b3f1b60a8ce26f";

export const GENESIS_MERKLE_ROOT =
  "4a5e1e4baab89f3a32518a88c31bc87f618f76673e2cc77ab2127b7afdeda33b";

export const HIGH_HASH_HEADER = "02" + GENESIS_HEADER.slice(2);

export const HIGH_HASH_BLOCK_ID =
  "dc3cdc644648f04c5b3c0266824f2420f4a33adb1666088e06bee2dddb7c9d71";

export const GENESIS_TARGET =
  "00000000ffff0000000000000000000000000000000000000000000000000000";

/** hash256("hello") */
export const HELLO_HASH256 =
  "9595c9df90075148eb06860365df33584b75bff782a510c6cd4883a419833d50";

/** hash256 of the empty byte string */
export const EMPTY_HASH256 =
  "5df6e0e2761359d30a8275058e299fcc0381534545f55cf43e41983f5d4c9456";
