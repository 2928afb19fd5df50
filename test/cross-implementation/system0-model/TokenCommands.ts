import fc from 'fast-check'
import { account, amount, anyAddress } from '../../../harness/arbitraries'
import { ApproveCommand } from './ApproveCommand'
import { GetBalanceCommand } from './GetBalanceCommand'
import { MintCommand } from './MintCommand'
import { TransferCommand } from './TransferCommand'
import { TransferFromCommand } from './TransferFromCommand'

export const TokenCommands = fc.commands(
  [
    fc.tuple(anyAddress(), amount()).map(([to, amt]) => new MintCommand(to, amt)),
    fc
      .tuple(anyAddress(), anyAddress(), amount())
      .map(([from, to, amt]) => new TransferCommand(from, to, amt)),
    fc
      .tuple(anyAddress(), anyAddress(), amount())
      .map(([owner, spender, amt]) => new ApproveCommand(owner, spender, amt)),
    fc
      .tuple(anyAddress(), anyAddress(), anyAddress(), amount())
      .map(([spender, from, to, amt]) => new TransferFromCommand(spender, from, to, amt)),
    account().map((a) => new GetBalanceCommand(a)),
  ],
  { maxCommands: 50 }
)
