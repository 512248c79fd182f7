/**
 * MangaChapterToken ABI
 *
 * ERC-1155 token where each id is one published manga chapter. Only the
 * members the ledger reads or decodes are listed.
 */
export const MangaChapterTokenAbi = [
  // Events
  {
    type: "event",
    anonymous: false,
    name: "TransferSingle",
    inputs: [
      { name: "operator", type: "address", indexed: true, internalType: "address" },
      { name: "from", type: "address", indexed: true, internalType: "address" },
      { name: "to", type: "address", indexed: true, internalType: "address" },
      { name: "id", type: "uint256", indexed: false, internalType: "uint256" },
      { name: "value", type: "uint256", indexed: false, internalType: "uint256" },
    ],
  },
  {
    type: "event",
    anonymous: false,
    name: "TransferBatch",
    inputs: [
      { name: "operator", type: "address", indexed: true, internalType: "address" },
      { name: "from", type: "address", indexed: true, internalType: "address" },
      { name: "to", type: "address", indexed: true, internalType: "address" },
      { name: "ids", type: "uint256[]", indexed: false, internalType: "uint256[]" },
      { name: "values", type: "uint256[]", indexed: false, internalType: "uint256[]" },
    ],
  },
  {
    type: "event",
    anonymous: false,
    name: "ChapterPublished",
    inputs: [
      { name: "creator", type: "address", indexed: true, internalType: "address" },
      { name: "tokenId", type: "uint256", indexed: true, internalType: "uint256" },
      { name: "creatorShare", type: "uint256", indexed: false, internalType: "uint256" },
    ],
  },
  {
    type: "event",
    anonymous: false,
    name: "ChapterMinted",
    inputs: [
      { name: "buyer", type: "address", indexed: true, internalType: "address" },
      { name: "tokenId", type: "uint256", indexed: true, internalType: "uint256" },
      { name: "amount", type: "uint256", indexed: false, internalType: "uint256" },
    ],
  },
  // View functions
  {
    type: "function",
    name: "balanceOf",
    inputs: [
      { name: "account", type: "address", internalType: "address" },
      { name: "id", type: "uint256", internalType: "uint256" },
    ],
    outputs: [{ name: "", type: "uint256", internalType: "uint256" }],
    stateMutability: "view",
  },
] as const;
