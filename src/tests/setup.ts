import log from 'electron-log/node'

// 测试中不写日志文件、不输出到控制台
log.transports.file.level = false
log.transports.console.level = false
