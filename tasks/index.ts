import './erc20/list-properties'
import './erc20/run-properties'
