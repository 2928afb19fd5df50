import { BigNumber } from 'ethers'
import {
  AllowanceCall,
  ApproveCall,
  BalanceOfCall,
  MintCall,
  TotalSupplyCall,
  TransferCall,
  TransferFromCall,
} from '../interface'

export const mint = (to: string, amount: BigNumber): MintCall => ({ op: 'mint', to, amount })

export const transfer = (sender: string, to: string, amount: BigNumber): TransferCall => ({
  op: 'transfer',
  sender,
  to,
  amount,
})

export const transferFrom = (
  sender: string,
  from: string,
  to: string,
  amount: BigNumber
): TransferFromCall => ({ op: 'transferFrom', sender, from, to, amount })

export const approve = (sender: string, spender: string, amount: BigNumber): ApproveCall => ({
  op: 'approve',
  sender,
  spender,
  amount,
})

export const totalSupply = (): TotalSupplyCall => ({ op: 'totalSupply' })

export const balanceOf = (account: string): BalanceOfCall => ({ op: 'balanceOf', account })

export const allowance = (owner: string, spender: string): AllowanceCall => ({
  op: 'allowance',
  owner,
  spender,
})
