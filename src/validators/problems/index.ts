import type { ProblemValidator } from '../types';
import {
  erc20ApproveAndCall,
  erc20DecreaseAllowance,
  erc20IncreaseAllowance,
  erc20Permit,
  erc20TransferFrom,
} from './allowances';
import {
  counterIncrement,
  donation,
  contractDelegateCall,
  contractPayableFallback,
  erc20FlashLoan,
  messageBoardPost,
} from './contracts';
import {
  callbackTransferAndCall,
  erc20Approve,
  erc20Burn,
  erc20Transfer,
  erc20TransferMaxAmount,
  erc20TransferPercentage,
  unwrapNativeValidator,
  wrapNativeValidator,
} from './erc20';
import { nativeTransfer, nativeTransferMaxAmount, nativeTransferPercentage, nativeTransferWithMessage } from './native';
import { erc1155TransferSingle, erc1155TransferWithData, erc721Approve, erc721SetApprovalForAll, erc721Transfer } from './nft';
import {
  queryBlockNumber,
  queryErc20Allowance,
  queryErc20Balance,
  queryGasPrice,
  queryMultiTokenBalance,
  queryNativeBalance,
  queryNftApproval,
  queryNftBalance,
  queryNftOwner,
  queryNftTokenUri,
  queryNonce,
  queryPendingRewards,
  queryStakedAmount,
  queryTokenMetadata,
  queryTokenTotalSupply,
} from './queries';
import { emergencyWithdraw, harvestRewards, stakeLpToken, stakeRewardPool, stakeSingleToken, unstake } from './staking';

export const BUILTIN_VALIDATORS: readonly ProblemValidator[] = [
  nativeTransfer,
  nativeTransferWithMessage,
  nativeTransferPercentage,
  nativeTransferMaxAmount,
  erc20Transfer,
  erc20Approve,
  erc20TransferPercentage,
  erc20TransferMaxAmount,
  erc20TransferFrom,
  erc20Burn,
  erc20IncreaseAllowance,
  erc20DecreaseAllowance,
  erc20Permit,
  erc20ApproveAndCall,
  erc20FlashLoan,
  wrapNativeValidator,
  unwrapNativeValidator,
  counterIncrement,
  messageBoardPost,
  donation,
  contractDelegateCall,
  contractPayableFallback,
  stakeSingleToken,
  stakeLpToken,
  stakeRewardPool,
  unstake,
  harvestRewards,
  emergencyWithdraw,
  callbackTransferAndCall,
  erc721Transfer,
  erc721Approve,
  erc721SetApprovalForAll,
  erc1155TransferSingle,
  erc1155TransferWithData,
  queryNativeBalance,
  queryErc20Balance,
  queryErc20Allowance,
  queryBlockNumber,
  queryGasPrice,
  queryTokenMetadata,
  queryNonce,
  queryStakedAmount,
  queryPendingRewards,
  queryTokenTotalSupply,
  queryNftBalance,
  queryNftOwner,
  queryNftApproval,
  queryNftTokenUri,
  queryMultiTokenBalance,
];
