import { utils } from 'ethers'

// The standard's surface. `mint` is a harness privilege and is not part of it.
export const ERC20_ABI = [
  'function totalSupply() view returns (uint256)',
  'function balanceOf(address account) view returns (uint256)',
  'function allowance(address owner, address spender) view returns (uint256)',
  'function transfer(address to, uint256 amount) returns (bool)',
  'function transferFrom(address from, address to, uint256 amount) returns (bool)',
  'function approve(address spender, uint256 amount) returns (bool)',
]

export const ERC20_INTERFACE = new utils.Interface(ERC20_ABI)
