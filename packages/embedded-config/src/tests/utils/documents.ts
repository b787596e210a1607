export const GREETING_DOCUMENT = `[a]
b = "Hello"
[a.c]
d = 5
`

export const MANIFEST = `[package]
name = "demo"
version = "0.1.0"

[package.metadata.embedded-config]
path = "conf/app.toml"
`
