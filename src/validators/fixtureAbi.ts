/**
 * Human-readable signatures of the fixture contracts in contracts/src.
 */

export const TOKEN = {
  balanceOf: 'function balanceOf(address owner) view returns (uint256)',
  allowance: 'function allowance(address owner, address spender) view returns (uint256)',
  transfer: 'function transfer(address to, uint256 amount) returns (bool)',
  approve: 'function approve(address spender, uint256 amount) returns (bool)',
  name: 'function name() view returns (string)',
  symbol: 'function symbol() view returns (string)',
  decimals: 'function decimals() view returns (uint8)',
  totalSupply: 'function totalSupply() view returns (uint256)',
  mint: 'function mint(address to, uint256 amount)',
  transferFrom: 'function transferFrom(address from, address to, uint256 amount) returns (bool)',
  burn: 'function burn(uint256 amount)',
  increaseAllowance: 'function increaseAllowance(address spender, uint256 addedValue) returns (bool)',
  decreaseAllowance: 'function decreaseAllowance(address spender, uint256 subtractedValue) returns (bool)',
  permit:
    'function permit(address owner, address spender, uint256 value, uint256 deadline, uint8 v, bytes32 r, bytes32 s)',
  nonces: 'function nonces(address owner) view returns (uint256)',
} as const;

export const CALLBACK_TOKEN = {
  transferAndCall: 'function transferAndCall(address to, uint256 amount, bytes data) returns (bool)',
  transferAndCallNoData: 'function transferAndCall(address to, uint256 amount) returns (bool)',
  approveAndCall: 'function approveAndCall(address spender, uint256 amount, bytes data) returns (bool)',
} as const;

export const WRAPPED_NATIVE = {
  deposit: 'function deposit() payable',
  withdraw: 'function withdraw(uint256 amount)',
} as const;

export const STAKING_POOL = {
  deposit: 'function deposit(uint256 amount)',
  withdraw: 'function withdraw(uint256 amount)',
  harvest: 'function harvest()',
  emergencyWithdraw: 'function emergencyWithdraw()',
  pendingReward: 'function pendingReward(address user) view returns (uint256)',
  userInfo: 'function userInfo(address user) view returns (uint256 amount, uint256 rewardDebt)',
} as const;

export const COUNTER = {
  increment: 'function increment()',
  count: 'function count() view returns (uint256)',
} as const;

export const MESSAGE_BOARD = {
  setMessage: 'function setMessage(string message)',
  message: 'function message() view returns (string)',
} as const;

export const DONATION_BOX = {
  donate: 'function donate() payable',
  totalDonations: 'function totalDonations() view returns (uint256)',
} as const;

export const MULTI_TOKEN = {
  balanceOf: 'function balanceOf(uint256 id, address owner) view returns (uint256)',
  safeTransferFrom: 'function safeTransferFrom(address from, address to, uint256 id, uint256 amount, bytes data)',
  lastTransferData: 'function lastTransferData() view returns (bytes)',
} as const;

export const NFT = {
  ownerOf: 'function ownerOf(uint256 tokenId) view returns (address)',
  balanceOf: 'function balanceOf(address owner) view returns (uint256)',
  getApproved: 'function getApproved(uint256 tokenId) view returns (address)',
  isApprovedForAll: 'function isApprovedForAll(address owner, address operator) view returns (bool)',
  tokenURI: 'function tokenURI(uint256 tokenId) view returns (string)',
  approve: 'function approve(address to, uint256 tokenId)',
  setApprovalForAll: 'function setApprovalForAll(address operator, bool approved)',
  transferFrom: 'function transferFrom(address from, address to, uint256 tokenId)',
  safeTransferFrom: 'function safeTransferFrom(address from, address to, uint256 tokenId)',
  safeTransferFromWithData: 'function safeTransferFrom(address from, address to, uint256 tokenId, bytes data)',
} as const;

export const DELEGATE_CALL = {
  setValue: 'function setValue(uint256 newValue)',
  value: 'function value() view returns (uint256)',
} as const;

export const FALLBACK_RECEIVER = {
  receivedCount: 'function receivedCount() view returns (uint256)',
  totalReceived: 'function totalReceived() view returns (uint256)',
} as const;

export const FLASH_LOAN_POOL = {
  executeFlashLoan: 'function executeFlashLoan(address token, uint256 amount)',
  flashLoanFee: 'function flashLoanFee(uint256 amount) pure returns (uint256)',
} as const;
