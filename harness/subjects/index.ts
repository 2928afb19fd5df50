import { ERC20Subject, SubjectFactory } from '../interface'
import { ERC20Model } from './ERC20Model'
import { ERC20AccruingReadMock } from './mocks/ERC20AccruingReadMock'
import { ERC20AccumulatingApproveMock } from './mocks/ERC20AccumulatingApproveMock'
import { ERC20AllowanceIgnoredMock } from './mocks/ERC20AllowanceIgnoredMock'
import { ERC20FalseReturnMock } from './mocks/ERC20FalseReturnMock'
import { ERC20FeeOnTransferMock } from './mocks/ERC20FeeOnTransferMock'
import { ERC20NoReturnMock } from './mocks/ERC20NoReturnMock'
import { ERC20NoZeroAddressCheckMock } from './mocks/ERC20NoZeroAddressCheckMock'
import { ERC20SelfTransferMock } from './mocks/ERC20SelfTransferMock'
import { ERC20UncappedSupplyMock } from './mocks/ERC20UncappedSupplyMock'
import { ERC20UncheckedMock } from './mocks/ERC20UncheckedMock'
import { ERC20ZeroAmountRevertMock } from './mocks/ERC20ZeroAmountRevertMock'

export {
  ERC20Model,
  ERC20AccruingReadMock,
  ERC20AccumulatingApproveMock,
  ERC20AllowanceIgnoredMock,
  ERC20FalseReturnMock,
  ERC20FeeOnTransferMock,
  ERC20NoReturnMock,
  ERC20NoZeroAddressCheckMock,
  ERC20SelfTransferMock,
  ERC20UncappedSupplyMock,
  ERC20UncheckedMock,
  ERC20ZeroAmountRevertMock,
}

export const SUBJECTS: { [name: string]: SubjectFactory } = {
  ERC20Model: () => new ERC20Model(),
  ERC20AccruingReadMock: () => new ERC20AccruingReadMock(),
  ERC20AccumulatingApproveMock: () => new ERC20AccumulatingApproveMock(),
  ERC20AllowanceIgnoredMock: () => new ERC20AllowanceIgnoredMock(),
  ERC20FalseReturnMock: () => new ERC20FalseReturnMock(),
  ERC20FeeOnTransferMock: () => new ERC20FeeOnTransferMock(),
  ERC20NoReturnMock: () => new ERC20NoReturnMock(),
  ERC20NoZeroAddressCheckMock: () => new ERC20NoZeroAddressCheckMock(),
  ERC20SelfTransferMock: () => new ERC20SelfTransferMock(),
  ERC20UncappedSupplyMock: () => new ERC20UncappedSupplyMock(),
  ERC20UncheckedMock: () => new ERC20UncheckedMock(),
  ERC20ZeroAmountRevertMock: () => new ERC20ZeroAmountRevertMock(),
}

export function getSubjectFactory(name: string): SubjectFactory {
  const factory = SUBJECTS[name]
  if (!factory) {
    throw new Error(`Unknown subject ${name}. Known subjects: ${Object.keys(SUBJECTS).join(', ')}`)
  }
  return factory
}

export const createSubject = (name: string): ERC20Subject => getSubjectFactory(name)()
